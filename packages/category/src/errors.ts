export class CategorySyntaxError extends Error {
  /** The category string that failed to parse */
  input: string;
  /** Offset of the offending character; the input length at end of input */
  offset: number;

  constructor(input: string, offset: number, detail: string) {
    super(`Malformed category "${input}" at offset ${offset}: ${detail}`);
    this.name = 'CategorySyntaxError';
    this.input = input;
    this.offset = offset;
  }
}
