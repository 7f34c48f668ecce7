/** A text format that a value can be written to and read back from. */
export interface FileCodec<T> {
  encode(value: T): string;
  /** @throws ParseError naming the first line that cannot be decoded. */
  decode(text: string): T;
}
