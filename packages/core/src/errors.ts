/**
 * Errors raised by core domain parsers.
 *
 * @tradekit/core has no dependency on other @tradekit packages, so these
 * extend Error directly and carry a string `code` like the AppError family.
 */

export class ParseError extends Error {
  public readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}
