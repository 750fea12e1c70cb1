import { LogRecord } from "../../../src/domain/entities/LogRecord";
import { LokiTransport } from "../../../src/infrastructure/logging/LokiTransport";
import {
  WinstonLogger,
  createConsoleLogger,
  createWinstonLogger,
  stringifyMeta,
} from "../../../src/infrastructure/logging/WinstonLogger";

const flushPromises = (): Promise<void> =>
  new Promise((resolve) => setImmediate(resolve));

describe("WinstonLogger", () => {
  let enqueue: jest.Mock<void, [LogRecord]>;
  let logger: WinstonLogger;

  beforeEach(() => {
    enqueue = jest.fn<void, [LogRecord]>();
    const diagnostics = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
    logger = new WinstonLogger(
      createWinstonLogger({
        level: "info",
        silentConsole: true,
        transports: [new LokiTransport({ sink: { enqueue }, labels: {}, diagnostics })],
      })
    );
  });

  it("should filter entries below the configured level", async () => {
    logger.debug("hidden");
    logger.info("visible");
    await flushPromises();

    expect(enqueue.mock.calls.map(([record]) => record.message)).toEqual(["visible"]);
  });

  it("should change level at runtime", async () => {
    logger.setLevel("debug");
    logger.debug("now visible");
    await flushPromises();

    expect(enqueue).toHaveBeenCalledTimes(1);
  });

  it("should tag entries from child loggers with their name", async () => {
    logger.child("service").error("stock update failed", { productId: 7 });
    await flushPromises();

    const [record] = enqueue.mock.calls[0];
    expect(record.logger).toBe("service");
    expect(record.message).toBe('stock update failed {"productId":7}');
  });

  it("should expose the underlying winston logger", () => {
    expect(logger.getLogger().level).toBe("info");
  });

  it("should build a console-only diagnostics logger", () => {
    const diagnostics = createConsoleLogger("warn", true);

    expect(diagnostics.getLogger().level).toBe("warn");
    expect(diagnostics.getLogger().transports).toHaveLength(1);
  });

  describe("stringifyMeta", () => {
    it("should keep keys in insertion order", () => {
      expect(stringifyMeta({ status: 200, path: "/produtos" })).toBe(
        '{"status":200,"path":"/produtos"}'
      );
    });

    it("should replace circular references instead of throwing", () => {
      const meta: Record<string, unknown> = { id: 1 };
      meta.self = meta;

      expect(stringifyMeta(meta)).toBe('{"id":1,"self":"[Circular]"}');
    });
  });
});
