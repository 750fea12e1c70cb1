import { LogBatch } from "../../../src/domain/entities/LogBatch";
import { LogRecord } from "../../../src/domain/entities/LogRecord";

describe("LogRecord Entity", () => {
  const timestamp = new Date("2024-05-01T12:00:00.000Z");

  describe("Creation", () => {
    it("should create a record with valid parameters", () => {
      const record = LogRecord.create({
        level: "warn",
        logger: "database",
        message: "pool exhausted",
        timestamp,
        labels: { job: "produto", environment: "test" },
      });

      expect(record.level).toBe("warn");
      expect(record.logger).toBe("database");
      expect(record.message).toBe("pool exhausted");
      expect(record.timestamp.toISOString()).toBe("2024-05-01T12:00:00.000Z");
      expect(record.labels).toEqual({ job: "produto", environment: "test" });
    });

    it("should default the timestamp to now", () => {
      const before = Date.now();
      const record = LogRecord.create({ level: "info", logger: "api", message: "hi" });

      expect(record.timestamp.getTime()).toBeGreaterThanOrEqual(before);
      expect(record.labels).toEqual({});
    });

    it("should reject an unknown level", () => {
      expect(() =>
        LogRecord.create({ level: "fatal", logger: "api", message: "x" })
      ).toThrow("Invalid log level: fatal");
    });

    it("should reject an empty logger name", () => {
      expect(() =>
        LogRecord.create({ level: "info", logger: "  ", message: "x" })
      ).toThrow("Logger name cannot be empty");
    });

    it("should reject non-string label values", () => {
      expect(() =>
        LogRecord.create({ level: "info", logger: "api", message: "x", labels: { port: 8000 } })
      ).toThrow('Label "port" must be a string');
    });
  });

  describe("Immutability", () => {
    it("should not change when the caller's inputs change", () => {
      const labels: Record<string, string> = { job: "produto" };
      const source = new Date(timestamp.getTime());
      const record = LogRecord.create({
        level: "info",
        logger: "api",
        message: "x",
        timestamp: source,
        labels,
      });

      labels.job = "changed";
      source.setFullYear(2000);
      record.timestamp.setFullYear(1999);

      expect(record.labels.job).toBe("produto");
      expect(record.timestamp.toISOString()).toBe("2024-05-01T12:00:00.000Z");
    });

    it("should freeze the record and its labels", () => {
      const record = LogRecord.create({
        level: "info",
        logger: "api",
        message: "x",
        labels: { job: "produto" },
      });

      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.labels)).toBe(true);
    });
  });

  describe("Stream labels", () => {
    it("should add level and logger to the record labels", () => {
      const record = LogRecord.create({
        level: "error",
        logger: "service",
        message: "x",
        labels: { job: "produto", application: "produto-api" },
      });

      expect(record.streamLabels()).toEqual({
        job: "produto",
        application: "produto-api",
        level: "error",
        logger: "service",
      });
    });
  });
});

describe("LogBatch Entity", () => {
  const records = [0, 1, 2].map((i) =>
    LogRecord.create({ level: "info", logger: "api", message: `m${i}` })
  );

  it("should keep records in order", () => {
    const batch = LogBatch.of(records, 3);

    expect(batch.size).toBe(3);
    expect(batch.records.map((r) => r.message)).toEqual(["m0", "m1", "m2"]);
    expect(batch.createdAt).toBeInstanceOf(Date);
  });

  it("should reject an empty batch", () => {
    expect(() => LogBatch.of([], 10)).toThrow("A log batch cannot be empty");
  });

  it("should reject a batch above the maximum size", () => {
    expect(() => LogBatch.of(records, 2)).toThrow(
      "A log batch cannot hold 3 records (max 2)"
    );
  });
});
