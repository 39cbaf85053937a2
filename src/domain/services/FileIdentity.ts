import crypto from 'node:crypto';
import path from 'node:path';

export interface FileIdentityInput {
  content?: Buffer | string;
  fileName: string;
  size?: number;
}

/**
 * Content-addressed identity: the same bytes under a different name resolve to the same identity.
 * Falls back to name + size when the caller only has file metadata.
 */
export const resolveFileIdentity = (input: FileIdentityInput): string => {
  if (input.content !== undefined) {
    const digest = crypto.createHash('sha256').update(input.content).digest('hex');
    return `sha256:${digest}`;
  }

  return `meta:${path.basename(input.fileName)}:${input.size ?? 0}`;
};
