import { describe, it, expect } from "vitest";
import { colorToHex, colorToNumber, defaultColorForKind, isKnownColor } from "@/phasor/colors";

describe("colors", () => {
  describe("defaultColorForKind", () => {
    it("should map voltage to blue and current to red", () => {
      expect(defaultColorForKind("voltage")).toBe("blue");
      expect(defaultColorForKind("CURRENT")).toBe("red");
    });

    it("should use gray for anything else", () => {
      expect(defaultColorForKind("flux")).toBe("gray");
    });
  });

  describe("colorToNumber", () => {
    it("should resolve named colors", () => {
      expect(colorToNumber("blue")).toBe(0x0000ff);
      expect(colorToNumber("Purple")).toBe(0x800080);
    });

    it("should resolve long and short hex", () => {
      expect(colorToNumber("#ff8800")).toBe(0xff8800);
      expect(colorToNumber("#F80")).toBe(0xff8800);
    });

    it("should fall back to gray for unknown colors", () => {
      expect(colorToNumber("chartreuse-ish")).toBe(0x808080);
      expect(colorToNumber("toString")).toBe(0x808080);
    });
  });

  it("should tell known colors apart", () => {
    expect(isKnownColor("cyan")).toBe(true);
    expect(isKnownColor("#123456")).toBe(true);
    expect(isKnownColor("#12345")).toBe(false);
    expect(isKnownColor("constructor")).toBe(false);
  });

  it("should format numbers as #rrggbb", () => {
    expect(colorToHex(0x0000ff)).toBe("#0000ff");
    expect(colorToHex(0xff8800)).toBe("#ff8800");
  });
});
