export type HarvestErrorKind =
  | 'password'
  | 'unreadable'
  | 'transient'
  | 'fatal'
  | 'folder-not-found';

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Every candidate was tried and none opened the document. Carries the count, never the passwords. */
export class PasswordFailure extends HarvestError {
  readonly kind = 'password';

  constructor(
    readonly filename: string,
    readonly attempts: number,
  ) {
    super(`No candidate password opened ${filename} (${attempts} attempted)`);
  }
}

export class UnreadableDocument extends HarvestError {
  readonly kind = 'unreadable';

  constructor(
    readonly filename: string,
    reason = 'no extractable text',
  ) {
    super(`Unreadable document ${filename}: ${reason}`);
  }
}

export class CollaboratorTransient extends HarvestError {
  readonly kind = 'transient';
}

/** The destination name already holds a file; storage never overwrites. */
export class NameTaken extends CollaboratorTransient {
  constructor(
    readonly folderPath: string,
    readonly fileName: string,
    options?: { cause?: unknown },
  ) {
    super(`Name taken meanwhile: ${folderPath}/${fileName}`, options);
  }
}

export class CollaboratorFatal extends HarvestError {
  readonly kind = 'fatal';
}

export class FolderNotFound extends HarvestError {
  readonly kind = 'folder-not-found';

  constructor(readonly folderPath: string) {
    super(`Folder not found: ${folderPath}`);
  }
}

/** Errors that fail one item and leave the rest of the phase running. */
export function isRecoverable(error: unknown): boolean {
  return error instanceof PasswordFailure || error instanceof CollaboratorTransient;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
