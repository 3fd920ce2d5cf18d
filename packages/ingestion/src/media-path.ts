import { extname } from 'node:path';
import { ModalityAnalysisError } from '@lexiscreen/shared/src/utils/errors.js';

export type MediaKind = 'image' | 'audio';

export function assertSupportedMedia(
  filePath: string,
  kind: MediaKind,
  allowedExtensions: readonly string[],
): void {
  const extension = extname(filePath).toLowerCase();
  if (!allowedExtensions.includes(extension)) {
    throw new ModalityAnalysisError(
      `Unsupported ${kind} type: ${extension === '' ? '(no extension)' : extension}`,
    );
  }
}
