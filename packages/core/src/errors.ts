export class LexiconFormatError extends Error {
  /** 1-based row of the offending entry, when it came from a file */
  line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `${message} (row ${line})`);
    this.name = 'LexiconFormatError';
    this.line = line;
  }
}
