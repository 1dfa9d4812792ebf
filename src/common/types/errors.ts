/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * File-system errors raised while reading census inputs or writing outputs
 */
export interface IoError extends AppError {
  readonly type: 'NotFound' | 'ReadError' | 'WriteError';
  readonly path: string;
}

/**
 * Not found errors
 */
export interface NotFoundError extends AppError {
  readonly type: 'NotFoundError';
  readonly resource: string;
  readonly id: string;
}

export const createNotFoundError = (resource: string, id: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `${resource} with id '${id}' not found`,
  resource,
  id,
});

/**
 * Maps a thrown file-system error to an IoError.
 */
export const toIoError = (error: unknown, filePath: string, action: 'read' | 'write'): IoError => {
  const code = (error as NodeJS.ErrnoException).code;
  const detail = error instanceof Error ? error.message : String(error);

  if (action === 'read' && code === 'ENOENT') {
    return { type: 'NotFound', message: `File not found at ${filePath}`, path: filePath };
  }

  return {
    type: action === 'read' ? 'ReadError' : 'WriteError',
    message: `Failed to ${action} ${filePath}: ${detail}`,
    path: filePath,
    cause: error,
  };
};
