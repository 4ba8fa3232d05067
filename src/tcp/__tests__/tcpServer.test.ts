import net from "net";
import { startTcpServer } from "../tcpServer";
import { FrameHandler } from "../../services/frameHandler";
import { DeviceRegistry } from "../../services/deviceRegistry";
import { tcpConfig } from "../../config/tcp";
import { CommandRecord } from "../../protocol/types";
import { InMemoryRecordStore } from "../../__tests__/fakes";

// The first save waits until the test opens the gate
class GatedRecordStore extends InMemoryRecordStore {
  saveCalls = 0;
  private openGate: () => void = () => undefined;
  private gate = new Promise<void>((resolve) => {
    this.openGate = resolve;
  });

  async save(record: CommandRecord): Promise<string> {
    this.saveCalls++;
    if (this.saveCalls === 1) await this.gate;
    return super.save(record);
  }

  release(): void {
    this.openGate();
  }
}

interface TestClient {
  socket: net.Socket;
  received: () => string;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const waitFor = async (check: () => boolean, timeoutMs = 2000): Promise<void> => {
  const started = Date.now();
  while (!check()) {
    if (Date.now() - started > timeoutMs) throw new Error("Condition not met in time");
    await sleep(5);
  }
};

describe("TCP server", () => {
  let server: net.Server;
  let store: GatedRecordStore;
  let registry: DeviceRegistry;
  let clients: net.Socket[];
  let logSpy: jest.SpyInstance;
  let port: number;

  const connect = (): Promise<TestClient> =>
    new Promise((resolve, reject) => {
      let data = "";
      const socket = net.connect(port, "127.0.0.1", () => resolve({ socket, received: () => data }));
      clients.push(socket);
      socket.setEncoding("utf8");
      socket.on("data", (chunk: string) => {
        data += chunk;
      });
      socket.once("error", reject);
    });

  const disconnectCount = () =>
    logSpy.mock.calls.filter((call) => call[0] === "❌ TCP client disconnected:").length;

  beforeEach(async () => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);

    store = new GatedRecordStore();
    registry = new DeviceRegistry();
    clients = [];
    server = await startTcpServer({
      frameHandler: new FrameHandler({ store }),
      registry,
      config: { ...tcpConfig, host: "127.0.0.1", port: 0 },
    });

    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("Expected a TCP address");
    port = address.port;
  });

  afterEach(async () => {
    store.release();
    clients.forEach((socket) => socket.destroy());
    await new Promise<void>((resolve) => server.close(() => resolve()));
    jest.restoreAllMocks();
  });

  it("handles frames of one connection strictly in order", async () => {
    const client = await connect();
    client.socket.write("[3G*1*0002*LK]\r\n[3G*1*0002*AL]\r\n");

    await waitFor(() => store.saveCalls === 1);
    await sleep(50);
    // AL is queued behind the unfinished LK frame
    expect(store.saveCalls).toBe(1);
    expect(client.received()).toBe("");

    store.release();
    await waitFor(() => client.received() === "[3G*1*0002*LK]\r\n[3G*1*0002*AL]\r\n");
    expect(store.records.map((r) => r.type)).toEqual(["LK", "AL"]);
  });

  it("writes replies back with CRLF and registers the device", async () => {
    store.release();
    const client = await connect();
    client.socket.write("[SG*8800000015*0002*LK]\r\n");

    await waitFor(() => client.received() === "[SG*8800000015*0002*LK]\r\n");
    expect(registry.isConnected("8800000015")).toBe(true);
    expect(registry.sessions().map((s) => s.deviceId)).toEqual(["8800000015"]);
  });

  it("keeps the connection open after a frame that fails to parse", async () => {
    store.release();
    const client = await connect();
    client.socket.write("[3G*1*0009*LK]\r\n");
    client.socket.write("[3G*1*0002*LK]\r\n");

    await waitFor(() => client.received() === "[3G*1*0002*LK]\r\n");
    expect(client.socket.destroyed).toBe(false);
    expect(store.records).toHaveLength(1);
    expect(registry.isConnected("1")).toBe(true);
  });

  it("releases on close only the devices the connection still owns", async () => {
    store.release();
    const first = await connect();
    first.socket.write("[3G*7*0002*LK]\r\n[3G*8*0002*LK]\r\n");
    await waitFor(() => first.received() === "[3G*7*0002*LK]\r\n[3G*8*0002*LK]\r\n");

    // Device 7 reconnects on a second socket
    const second = await connect();
    second.socket.write("[3G*7*0002*LK]\r\n");
    await waitFor(() => second.received() === "[3G*7*0002*LK]\r\n");

    first.socket.destroy();
    await waitFor(() => disconnectCount() === 1);
    expect(registry.isConnected("7")).toBe(true);
    expect(registry.isConnected("8")).toBe(false);

    second.socket.destroy();
    await waitFor(() => disconnectCount() === 2);
    expect(registry.size).toBe(0);
  });
});
