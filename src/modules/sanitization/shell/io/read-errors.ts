import type { SourceReadError } from '../../core/errors.js';

export const toSourceReadError = (error: unknown, filePath: string): SourceReadError => {
  const code = (error as NodeJS.ErrnoException).code;
  if (code === 'ENOENT') {
    return { type: 'NotFound', message: `Input file not found at ${filePath}` };
  }

  return {
    type: 'ReadError',
    message: `Failed to read ${filePath}: ${(error as Error).message}`,
  };
};
