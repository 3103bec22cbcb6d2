/**
 * Sanitize a name for use in cloud resources.
 *
 * @param name - Raw name to sanitize
 * @param maxLength - Maximum length (default: 63 for most cloud resources)
 * @returns Sanitized name safe for cloud resources
 */
export function sanitizeName(name: string, maxLength = 63): string {
  const sanitized = name
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/-+/g, "-")
    .substring(0, maxLength)
    .replace(/-+$/g, "");

  if (!sanitized) {
    throw new Error(`Invalid name: "${name}" produces empty sanitized value`);
  }

  return sanitized;
}

/**
 * Name of the bucket that holds an application's deployment artifacts:
 * `elasticbeanstalk-<region>-<application>`, within the 63 character limit.
 */
export function artifactBucketName(region: string, applicationName: string): string {
  return sanitizeName(`elasticbeanstalk-${region}-${applicationName}`, 63);
}
