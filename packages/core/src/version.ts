/**
 * Package version. Kept equal to package.json by the version test.
 */
export const VERSION = '0.1.0';

export interface VersionInfo {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease?: string | undefined;
}

function parseVersion(version: string): VersionInfo {
  const match = /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?$/.exec(version);
  if (match === null) {
    throw new TypeError(`Invalid version: ${version}`);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4],
  };
}

export const VERSION_INFO: VersionInfo = parseVersion(VERSION);
