/**
 * The outcome of one parse pass. Resolved values are read through the
 * ArgumentRef handles returned at registration.
 */
export class ParsedArguments {
  constructor(
    readonly parserId: string,
    readonly pass: number,
    /** First CLI token, if any. */
    readonly binary: string | undefined,
    /** Unconsumed tokens in original order, binary name first. */
    readonly remainder: readonly string[],
  ) {
    Object.freeze(this);
  }
}
