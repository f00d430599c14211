export class FilterSyntaxError extends Error {
  constructor(
    message: string,
    readonly expression: string,
    readonly column: number,
  ) {
    super(`${message} at column ${column + 1} of filter: ${expression}`);
    this.name = 'FilterSyntaxError';
  }
}

export class TrackOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrackOptionsError';
  }
}
