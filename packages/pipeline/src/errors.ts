/** None of the candidate text encodings produced a parsable table. */
export class DecodeError extends Error {
  readonly encodings: readonly string[];

  constructor(path: string, encodings: readonly string[], cause: unknown) {
    super(`Could not decode ${path} with any of: ${encodings.join(", ")}`, { cause });
    this.name = "DecodeError";
    this.encodings = encodings;
  }
}

/** The raw header does not describe a crowding export. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}
