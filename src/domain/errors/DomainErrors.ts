export type ErrorClassification = 'fatal' | 'security' | 'skippable';

/** 封閉的錯誤種類列舉，PathResolution 失敗時一定是其中之一 */
export type BoundaryErrorKind = 'InvalidRoot' | 'BoundaryViolation' | 'Inaccessible';

/** 所有 scanguard domain 錯誤的基底類別 */
export abstract class ScanGuardError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly kind: BoundaryErrorKind;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Fatal ---

export type InvalidRootReason = 'not-found' | 'not-directory' | 'forbidden';

export class InvalidRootError extends ScanGuardError {
  readonly classification = 'fatal' as const;
  readonly kind = 'InvalidRoot' as const;
  readonly code = 'INVALID_ROOT';

  constructor(
    public readonly root: string,
    public readonly reason: InvalidRootReason,
    options?: ErrorOptions,
  ) {
    super(InvalidRootError.describe(root, reason), options);
  }

  private static describe(root: string, reason: InvalidRootReason): string {
    switch (reason) {
      case 'not-found':
        return `Project root does not exist: ${root}`;
      case 'not-directory':
        return `Project root is not a directory: ${root}`;
      case 'forbidden':
        return `Cannot analyze system directory: ${root}`;
    }
  }
}

// --- Security ---

export class BoundaryViolationError extends ScanGuardError {
  readonly classification = 'security' as const;
  readonly kind = 'BoundaryViolation' as const;
  readonly code: string = 'BOUNDARY_VIOLATION';

  constructor(
    public readonly candidate: string,
    public readonly resolved: string,
    public readonly root: string,
    options?: ErrorOptions,
  ) {
    super(
      `Path traversal detected: '${candidate}' resolves to '${resolved}' which is outside project root '${root}'`,
      options,
    );
  }
}

export class SymlinkAttackError extends BoundaryViolationError {
  readonly code: string = 'SYMLINK_ATTACK';

  constructor(link: string, target: string, root: string, options?: ErrorOptions) {
    super(link, target, root, options);
    this.message = `Symlink attack detected: ${link} -> ${target} (target is outside project root: ${root})`;
  }

  get link(): string { return this.candidate; }
  get target(): string { return this.resolved; }
}

// --- Skippable ---

export type InaccessibleCause =
  | 'not-found'
  | 'permission-denied'
  | 'symlink-escape'
  | 'symlink-loop'
  | 'not-directory'
  | 'io-error';

export class InaccessibleError extends ScanGuardError {
  readonly classification = 'skippable' as const;
  readonly kind = 'Inaccessible' as const;
  readonly code = 'INACCESSIBLE';

  constructor(
    public readonly path: string,
    public readonly reason: InaccessibleCause,
    detail?: string,
    options?: ErrorOptions,
  ) {
    super(`Path is inaccessible (${reason}): ${path}${detail ? ` - ${detail}` : ''}`, options);
  }
}

export type BoundaryError = InvalidRootError | BoundaryViolationError | InaccessibleError;

/** 使用者可見的訊息：security 類錯誤不外洩路徑細節 */
export const GENERIC_SECURITY_MESSAGE =
  'Security check failed: the requested path is outside the project boundary.';

export function toUserMessage(err: unknown): string {
  if (err instanceof ScanGuardError && err.classification === 'security') {
    return GENERIC_SECURITY_MESSAGE;
  }
  if (err instanceof Error) return err.message;
  return 'Unknown error';
}

/** Node errno → InaccessibleCause */
export function causeFromErrno(err: unknown): InaccessibleCause {
  const code = errnoCode(err);
  switch (code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'not-found';
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied';
    case 'ELOOP':
      return 'symlink-loop';
    default:
      return 'io-error';
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
