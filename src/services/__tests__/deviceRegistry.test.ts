import { DeviceRegistry } from "../deviceRegistry";
import { FakeConnection } from "../../__tests__/fakes";

describe("DeviceRegistry", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("writes frames with CRLF to the device's connection", () => {
    const registry = new DeviceRegistry();
    const conn = new FakeConnection();
    registry.touch("8800000015", conn);

    expect(registry.send("8800000015", "[3G*8800000015*0002*CR]")).toBe(true);
    expect(conn.written).toEqual(["[3G*8800000015*0002*CR]\r\n"]);
  });

  it("reports unknown devices as not delivered", () => {
    const registry = new DeviceRegistry();
    expect(registry.send("404", "[3G*404*0002*CR]")).toBe(false);
  });

  it("does not write to a destroyed connection", () => {
    const registry = new DeviceRegistry();
    const conn = new FakeConnection();
    registry.touch("1", conn);
    conn.destroyed = true;

    expect(registry.isConnected("1")).toBe(false);
    expect(registry.send("1", "[3G*1*0002*CR]")).toBe(false);
    expect(conn.written).toEqual([]);
  });

  it("rebinds a device that reconnects and only releases the current owner", () => {
    const registry = new DeviceRegistry();
    const oldConn = new FakeConnection("10.0.0.1");
    const newConn = new FakeConnection("10.0.0.2");

    registry.touch("1", oldConn, new Date("2024-01-01T00:00:00Z"));
    registry.touch("1", newConn, new Date("2024-01-01T00:05:00Z"));

    expect(registry.release(oldConn)).toEqual([]);
    expect(registry.sessions()).toEqual([
      {
        deviceId: "1",
        remoteAddress: "10.0.0.2",
        connectedAt: new Date("2024-01-01T00:05:00Z"),
        lastFrameAt: new Date("2024-01-01T00:05:00Z"),
      },
    ]);
    expect(registry.release(newConn)).toEqual(["1"]);
    expect(registry.size).toBe(0);
  });

  it("updates lastFrameAt on the same connection", () => {
    const registry = new DeviceRegistry();
    const conn = new FakeConnection();
    registry.touch("1", conn, new Date("2024-01-01T00:00:00Z"));
    registry.touch("1", conn, new Date("2024-01-01T00:01:00Z"));

    const [session] = registry.sessions();
    expect(session.connectedAt).toEqual(new Date("2024-01-01T00:00:00Z"));
    expect(session.lastFrameAt).toEqual(new Date("2024-01-01T00:01:00Z"));
  });
});
