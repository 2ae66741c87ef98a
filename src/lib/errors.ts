/**
 * Raised when command-line input breaks a rule the run depends on.
 * Nothing has touched the filesystem when this is thrown.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Raised when the source icon cannot be read or decoded.
 */
export class ImageLoadError extends Error {
  readonly imagePath: string;

  constructor(imagePath: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Cannot load image "${imagePath}": ${reason}`, { cause });
    this.name = 'ImageLoadError';
    this.imagePath = imagePath;
  }
}
