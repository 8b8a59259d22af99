export interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
}

export interface OpenedPdf {
  numPages: number;
  /** Text items of one page (1-based), in content-stream order. */
  pageText(pageNumber: number): Promise<PositionedText[]>;
  close(): Promise<void>;
}

/**
 * Opening without a password throws PasswordRequired for an encrypted file;
 * opening with a wrong one throws IncorrectPassword.
 */
export interface PdfOpener {
  open(bytes: Uint8Array, password?: string): Promise<OpenedPdf>;
}

export class PasswordRequired extends Error {
  constructor() {
    super('Document is encrypted and no password was given');
    this.name = 'PasswordRequired';
  }
}

export class IncorrectPassword extends Error {
  constructor() {
    super('Password did not open the document');
    this.name = 'IncorrectPassword';
  }
}
