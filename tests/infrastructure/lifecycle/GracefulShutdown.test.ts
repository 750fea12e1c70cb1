import { EventEmitter } from "events";
import { Logger } from "../../../src/application/interfaces/Logger";
import { registerGracefulShutdown } from "../../../src/infrastructure/lifecycle/GracefulShutdown";

const flushPromises = (): Promise<void> =>
  new Promise((resolve) => setImmediate(resolve));

describe("registerGracefulShutdown", () => {
  let processRef: EventEmitter;
  let exit: jest.Mock<void, [number]>;
  let mockLogger: jest.Mocked<Logger>;

  beforeEach(() => {
    processRef = new EventEmitter();
    exit = jest.fn<void, [number]>();
    mockLogger = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
  });

  it("should drain the target on SIGTERM and exit with 0", async () => {
    const target = { shutdown: jest.fn().mockResolvedValue({ drained: true, dropped: 0 }) };
    registerGracefulShutdown(target, { logger: mockLogger, timeoutMs: 3000, processRef, exit });

    processRef.emit("SIGTERM");
    await flushPromises();

    expect(target.shutdown).toHaveBeenCalledWith(3000);
    expect(mockLogger.info).toHaveBeenCalledWith("Received SIGTERM, shutting down gracefully");
    expect(mockLogger.info).toHaveBeenCalledWith("Application shutdown completed", {
      result: { drained: true, dropped: 0 },
    });
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("should exit with 1 when shutdown throws", async () => {
    const target = { shutdown: jest.fn().mockRejectedValue(new Error("boom")) };
    registerGracefulShutdown(target, { logger: mockLogger, processRef, exit });

    processRef.emit("SIGINT");
    await flushPromises();

    expect(mockLogger.error).toHaveBeenCalledWith("Error during shutdown", { error: "boom" });
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("should only shut down once when several signals arrive", async () => {
    const target = { shutdown: jest.fn().mockResolvedValue(undefined) };
    registerGracefulShutdown(target, { logger: mockLogger, processRef, exit });

    processRef.emit("SIGTERM");
    processRef.emit("SIGINT");
    await flushPromises();

    expect(target.shutdown).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it("should listen only to the configured signals", async () => {
    const target = { shutdown: jest.fn().mockResolvedValue(undefined) };
    registerGracefulShutdown(target, {
      logger: mockLogger,
      processRef,
      exit,
      signals: ["SIGUSR2"],
    });

    processRef.emit("SIGTERM");
    await flushPromises();
    expect(target.shutdown).not.toHaveBeenCalled();

    processRef.emit("SIGUSR2");
    await flushPromises();
    expect(target.shutdown).toHaveBeenCalledTimes(1);
  });

  it("should return the routine for hosts with their own hooks", async () => {
    const target = { shutdown: jest.fn().mockResolvedValue(undefined) };
    const shutdown = registerGracefulShutdown(target, { logger: mockLogger, processRef, exit });

    await shutdown("beforeExit");

    expect(mockLogger.info).toHaveBeenCalledWith("Received beforeExit, shutting down gracefully");
    expect(exit).toHaveBeenCalledWith(0);
  });
});
