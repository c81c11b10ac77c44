import { EnrollError } from '@mac-enroll/core';

export interface ShareLocation {
  host: string;
  share: string;
  /** Directory inside the share, without leading or trailing slashes; '' for the share root */
  directory: string;
}

/**
 * Split a share URL such as `smb://files.example.org/enroll/incoming/macs`
 * into host, share name and directory.
 *
 * @throws EnrollError INVALID_SHARE_PATH when the URL cannot be parsed or has
 * no host, TRANSPORT_ERROR when it names no share
 */
export function parseSharePath(sharePath: string): ShareLocation {
  let url: URL;
  let segments: string[];
  try {
    url = new URL(sharePath.trim());
    segments = url.pathname
      .split('/')
      .filter((segment) => segment.length > 0)
      .map((segment) => decodeURIComponent(segment));
  } catch (error) {
    throw new EnrollError({
      code: 'INVALID_SHARE_PATH',
      message: `Invalid share path: ${sharePath}`,
      suggestion: 'Use the form smb://host/share/directory.',
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!url.hostname) {
    throw new EnrollError({
      code: 'INVALID_SHARE_PATH',
      message: `Invalid share path: ${sharePath}`,
      suggestion: 'Use the form smb://host/share/directory.',
    });
  }

  const [share = '', ...rest] = segments;

  if (!share) {
    throw new EnrollError({
      code: 'TRANSPORT_ERROR',
      message: 'Share path is missing the share name',
      suggestion: 'Add the share name after the host: smb://host/share.',
    });
  }

  return { host: url.hostname, share, directory: rest.join('/') };
}

/** Path of a file inside the share directory */
export function remoteFilePath(location: ShareLocation, filename: string): string {
  return location.directory ? `${location.directory}/${filename}` : filename;
}
