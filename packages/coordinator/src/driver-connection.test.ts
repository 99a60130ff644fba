import type { SensorEvent } from "@sensorgate/contracts";
import { createSilentLogger } from "@sensorgate/telemetry";
import { describe, expect, it } from "vitest";

import { DriverConnection } from "./driver-connection.js";
import { SerialWorkQueue } from "./serial-queue.js";
import { createCoordinatorTelemetry } from "./telemetry.js";
import { SimulatedDriverRegistry, SimulatedSensorDriver } from "./testing/simulated-driver.js";

const setup = (driver: SimulatedSensorDriver | undefined = new SimulatedSensorDriver()) => {
  const telemetry = createCoordinatorTelemetry({ logger: createSilentLogger() });
  const queue = new SerialWorkQueue({ telemetry });
  const registry = new SimulatedDriverRegistry(driver);
  const connection = new DriverConnection({ registry, queue, telemetry });
  return { queue, registry, connection };
};

const ignoreEvents = (_event: SensorEvent): void => undefined;

describe("DriverConnection", () => {
  it("reports an unavailable driver", async () => {
    const { connection, registry } = setup(undefined);

    const result = await connection.beginEnroll(new Uint8Array([1]), 0, 60);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({
        code: "sensor.driver_unavailable",
        details: { operation: "enroll" },
        retryable: true,
      });
    }
    expect(registry.lookups).toBe(1);
  });

  it("looks the driver up once and reuses the handle", async () => {
    const driver = new SimulatedSensorDriver();
    const { connection, registry } = setup(driver);

    await connection.cancelEnroll();
    await connection.cancelAuthenticate();

    expect(registry.lookups).toBe(1);
    expect(driver.calls.map((call) => call.method)).toEqual(["cancelEnrollment", "cancelAuthentication"]);
  });

  it("turns a non-zero status into a rejection", async () => {
    const driver = new SimulatedSensorDriver();
    driver.setStatus("authenticate", 3);
    const { connection } = setup(driver);

    const result = await connection.beginAuthenticate(99n, 10);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("sensor.driver_rejected");
      expect(result.error.details).toEqual({ operation: "authenticate", status: 3 });
    }
    expect(driver.callsTo("authenticate")[0]?.args).toEqual([99n, 10]);
  });

  it("turns a throwing call into a call failure", async () => {
    const driver = new SimulatedSensorDriver();
    driver.failWith("remove", new Error("transport closed"));
    const { connection } = setup(driver);

    const result = await connection.remove(4, 0);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("sensor.driver_call_failed");
      expect(result.error.details).toEqual({ operation: "remove", cause: "Error: transport closed" });
    }
  });

  it("records the device id reported by open", async () => {
    const driver = new SimulatedSensorDriver({ deviceId: 0x1234n });
    const { connection } = setup(driver);

    expect(await connection.open(ignoreEvents)).toEqual({ ok: true, value: 0x1234n });
    expect(connection.deviceId).toBe(0x1234n);
    expect(driver.opened).toBe(true);
  });

  it("forgets a dead driver and re-opens its replacement", async () => {
    const first = new SimulatedSensorDriver({ deviceId: 0x10n });
    const { connection, registry, queue } = setup(first);
    await connection.open(ignoreEvents);

    first.kill();
    await queue.whenIdle();
    expect(connection.connected).toBe(false);
    expect(connection.deviceId).toBe(0n);

    const second = new SimulatedSensorDriver({ deviceId: 0x20n });
    registry.install(second);
    const cancelled = await connection.cancelEnroll();

    expect(cancelled.ok).toBe(true);
    expect(registry.lookups).toBe(2);
    expect(second.calls.map((call) => call.method)).toEqual(["open", "cancelEnrollment"]);
    expect(connection.deviceId).toBe(0x20n);
  });

  it("drops a driver it cannot watch for death", async () => {
    const dead = new SimulatedSensorDriver();
    dead.kill();
    const { connection } = setup(dead);

    const result = await connection.getAuthenticatorId();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("sensor.driver_unavailable");
    }
    expect(connection.connected).toBe(false);
    expect(dead.calls).toEqual([]);
  });

  it("drops the replacement when re-opening fails", async () => {
    const first = new SimulatedSensorDriver();
    const { connection, registry, queue } = setup(first);
    await connection.open(ignoreEvents);
    first.kill();
    await queue.whenIdle();

    const broken = new SimulatedSensorDriver();
    broken.failWith("open", new Error("hal not ready"));
    registry.install(broken);

    const result = await connection.preEnroll();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("sensor.driver_unavailable");
    }
    expect(connection.connected).toBe(false);
    expect(broken.callsTo("preEnroll")).toEqual([]);
    expect(broken.deathWatchers).toBe(0);
  });

  it("stops watching the driver on release", async () => {
    const driver = new SimulatedSensorDriver();
    const { connection } = setup(driver);
    await connection.open(ignoreEvents);
    expect(driver.deathWatchers).toBe(1);

    connection.release();

    expect(driver.deathWatchers).toBe(0);
    expect(connection.connected).toBe(false);
  });
});
