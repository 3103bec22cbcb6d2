const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Application version label derived from the local time: `vYYYYMMDD_HHMMSS`.
 */
export function createVersionLabel(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `v${day}_${time}`;
}

/**
 * EB CLI platform branch name for a solution stack name.
 *
 * "64bit Amazon Linux 2023 v4.3.0 running Docker" becomes
 * "Docker running on 64bit Amazon Linux 2023". Names that do not follow the
 * solution stack pattern are returned unchanged.
 */
export function toEbCliPlatformName(solutionStack: string): string {
  const match = /^(.+?) v\d+(?:\.\d+)* running (.+)$/.exec(solutionStack.trim());
  if (!match) {
    return solutionStack;
  }
  const [, operatingSystem, runtime] = match;
  return `${runtime} running on ${operatingSystem}`;
}
