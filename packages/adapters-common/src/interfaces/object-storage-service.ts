/**
 * Interface for the bucket that stores deployment artifacts.
 */
export interface IObjectStorageService {
  bucketExists(bucket: string): Promise<boolean>;

  /**
   * Create a bucket in the given region.
   */
  createBucket(bucket: string, region: string): Promise<void>;

  /**
   * Upload a local file.
   *
   * @param filePath - Absolute path of the file to upload
   */
  uploadFile(bucket: string, key: string, filePath: string): Promise<void>;
}
