import { composeCommand, formatFrame, renderOutbound, zeroPad4 } from "../responseFormatter";
import { classifyCommand, commandToken, replyLengthFor, SERVER_COMMANDS } from "../commands";

describe("responseFormatter", () => {
  it("formats a reply frame", () => {
    expect(formatFrame("CS", "1234567890", "0006", "CONFIG,1")).toBe("[CS*1234567890*0006*CONFIG,1]");
  });

  it("pads lengths to four digits without truncating", () => {
    expect(zeroPad4(0)).toBe("0000");
    expect(zeroPad4(17)).toBe("0017");
    expect(zeroPad4(12345)).toBe("12345");
  });

  it("composes outbound commands with a computed length", () => {
    // "APN,cmnet,,,20634" is 17 characters
    expect(composeCommand("8800000015", "APN", ",cmnet,,,20634")).toBe("[3G*8800000015*0017*APN,cmnet,,,20634]");
    expect(composeCommand("8800000015", "CR", "")).toBe("[3G*8800000015*0002*CR]");
  });

  it("always uses the 3G prefix for outbound commands", () => {
    expect(renderOutbound({ deviceId: "42", commandToken: "UPLOAD", extraContent: ",600" })).toBe(
      "[3G*42*0010*UPLOAD,600]"
    );
  });
});

describe("commands", () => {
  it("extracts the token before the first comma", () => {
    expect(commandToken("UD,1,2")).toBe("UD");
    expect(commandToken("LK")).toBe("LK");
    expect(commandToken(",x")).toBe("");
  });

  it("looks reply lengths up from the fixed table", () => {
    expect(replyLengthFor("SOS2")).toBe("0004");
    expect(replyLengthFor("IP")).toBe("0008");
    expect(replyLengthFor("FALLDOWN")).toBe("0006");
    expect(replyLengthFor("LK")).toBe("0002");
  });

  it("knows the whole server command set", () => {
    expect(SERVER_COMMANDS).toHaveLength(61);
    expect(classifyCommand("rcapture")).toEqual({ kind: "serverAck", token: "rcapture", replyLength: "0006" });
  });

  it("classifies the bespoke tokens before the server commands", () => {
    expect(classifyCommand("CONFIG")).toEqual({ kind: "config", token: "CONFIG" });
    expect(classifyCommand("img")).toEqual({ kind: "image", token: "img" });
    expect(classifyCommand("")).toEqual({ kind: "unrecognized", token: "" });
  });
});
