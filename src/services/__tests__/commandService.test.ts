import { CommandService, PRESET_COMMANDS } from "../commandService";
import { DeviceRegistry } from "../deviceRegistry";
import { FakeConnection } from "../../__tests__/fakes";

describe("CommandService", () => {
  let registry: DeviceRegistry;
  let conn: FakeConnection;
  let service: CommandService;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    registry = new DeviceRegistry();
    conn = new FakeConnection();
    registry.touch("8800000015", conn);
    service = new CommandService(registry);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("composes the frame and pushes it to the device", () => {
    expect(service.sendCommand("8800000015", "APN", ",cmnet,,,20634")).toBe("[3G*8800000015*0017*APN,cmnet,,,20634]");
    expect(conn.written).toEqual(["[3G*8800000015*0017*APN,cmnet,,,20634]\r\n"]);
  });

  it("returns the frame even when the device is offline", () => {
    expect(service.sendCommand("1111111111", "FIND")).toBe("[3G*1111111111*0004*FIND]");
    expect(service.deliver("1111111111", "FIND")).toEqual({
      frame: "[3G*1111111111*0004*FIND]",
      delivered: false,
    });
  });

  it("sends presets with their default content", () => {
    expect(service.sendPreset("8800000015", "UPLOAD")).toEqual({
      frame: "[3G*8800000015*0010*UPLOAD,600]",
      delivered: true,
    });
    expect(service.sendPreset("8800000015", "IP")?.frame).toBe("[3G*8800000015*0020*IP,113.81.229.9,5900]");
    expect(service.sendPreset("8800000015", "SOS1")?.frame).toBe("[3G*8800000015*0016*SOS1,00000000000]");
  });

  it("has no preset for other commands", () => {
    expect(service.sendPreset("8800000015", "FACTORY")).toBeNull();
    expect(service.sendPreset("8800000015", "toString")).toBeNull();
    expect(Object.keys(PRESET_COMMANDS)).toEqual(["APN", "UPLOAD", "CR", "SOS1", "IP"]);
  });
});
