/** Outcome of a node invocation. */
export type ResultStatus = "OK" | "FAIL";

/**
 * Two-state outcome carrying an opaque payload. Status and data are
 * independent: a FAIL may carry the payload that caused it and an OK may carry
 * nothing.
 */
export class Result<T = unknown> {
  private constructor(
    public readonly status: ResultStatus,
    public readonly data: T | undefined,
  ) {}

  static OK<T = unknown>(data?: T): Result<T> {
    return new Result<T>("OK", data);
  }

  static FAIL<T = unknown>(data?: T): Result<T> {
    return new Result<T>("FAIL", data);
  }

  isOk(): boolean {
    return this.status === "OK";
  }

  isFail(): boolean {
    return this.status === "FAIL";
  }

  /** Same data under the opposite status. */
  inverted(): Result<T> {
    return this.isOk() ? Result.FAIL(this.data) : Result.OK(this.data);
  }

  toString(): string {
    return `Result(${this.status}, ${String(this.data)})`;
  }
}
