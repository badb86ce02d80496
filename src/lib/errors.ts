export class Aup2ParseError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`Line ${line}: ${message}`);
    this.name = 'Aup2ParseError';
    this.line = line;
  }
}

/** The project lacks data the transform needs (a frame range, an owning scene, ...). */
export class StructuralError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StructuralError';
  }
}

/** A target layer or scene id outside the non-negative integers. */
export class OptionRangeError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid ${option}: ${message}`);
    this.name = 'OptionRangeError';
    this.option = option;
  }
}
