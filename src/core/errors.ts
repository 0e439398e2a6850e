/** Chain listing does not have the shape the inspector expects. */
export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

/** A snapshot could not be written. Raised before any rule is touched. */
export class BackupError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = "BackupError";
    this.hint = hint;
  }
}
