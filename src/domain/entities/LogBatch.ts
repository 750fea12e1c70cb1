import { LogRecord } from "./LogRecord";

export class LogBatch {
  private constructor(
    private readonly _records: readonly LogRecord[],
    private readonly _createdAt: Date
  ) {}

  public static of(records: readonly LogRecord[], maxSize: number): LogBatch {
    if (records.length === 0) {
      throw new Error("A log batch cannot be empty");
    }
    if (records.length > maxSize) {
      throw new Error(
        `A log batch cannot hold ${records.length} records (max ${maxSize})`
      );
    }
    return new LogBatch(Object.freeze([...records]), new Date());
  }

  public get records(): readonly LogRecord[] {
    return this._records;
  }

  public get size(): number {
    return this._records.length;
  }

  public get createdAt(): Date {
    return this._createdAt;
  }
}
