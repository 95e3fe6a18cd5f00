import { describe, it, expect } from "vitest";
import {
  crc16,
  crc16X25,
  crc16CcittFalse,
  getCrc,
  addCrc,
  verifyCrc,
  isCrcVariant,
} from "../src/crc.js";

const CHECK = Buffer.from("123456789", "ascii");

describe("CRC-16/X.25", () => {
  it("should match the standard check value", () => {
    expect(crc16X25(CHECK)).toBe(0x906e);
  });

  it("should be the default variant", () => {
    expect(crc16(CHECK)).toBe(0x906e);
  });

  it("should compute the CRC of a measure request", () => {
    // address 2, measure (59), input 1 voltage (23), global
    const data = Buffer.from([2, 59, 23, 1, 0, 0, 0, 0]);
    expect(crc16X25(data)).toBe(0x7df1);
  });
});

describe("CRC-16/CCITT-FALSE", () => {
  it("should match the standard check value", () => {
    expect(crc16CcittFalse(CHECK)).toBe(0x29b1);
    expect(crc16(CHECK, "ccitt-false")).toBe(0x29b1);
  });

  it("should differ from X.25 on the same frame", () => {
    const data = Buffer.from([2, 59, 23, 1, 0, 0, 0, 0]);
    expect(crc16CcittFalse(data)).toBe(0xd4ae);
  });
});

describe("CRC helpers", () => {
  it("getCrc should return the CRC low byte first", () => {
    const crc = getCrc(Buffer.from([6, 6, 0x41, 0x20, 0, 0]));
    expect([...crc]).toEqual([0xda, 0xdd]);
  });

  it("addCrc should append two bytes", () => {
    const frame = addCrc(Buffer.from([0, 6, 2, 2, 2, 0]));
    expect([...frame]).toEqual([0, 6, 2, 2, 2, 0, 0x69, 0x73]);
  });

  it("verifyCrc should accept a frame built with the same variant", () => {
    const data = Buffer.from([2, 78, 0, 0, 0, 0, 0, 0]);
    expect(verifyCrc(addCrc(data))).toBe(true);
    expect(verifyCrc(addCrc(data, "ccitt-false"), "ccitt-false")).toBe(true);
  });

  it("verifyCrc should reject a frame built with the other variant", () => {
    const data = Buffer.from([2, 78, 0, 0, 0, 0, 0, 0]);
    expect(verifyCrc(addCrc(data, "ccitt-false"))).toBe(false);
  });

  it("verifyCrc should reject any single flipped bit", () => {
    const frame = addCrc(Buffer.from([2, 59, 23, 1, 0, 0, 0, 0]));
    for (let bit = 0; bit < frame.length * 8; bit++) {
      const corrupted = Buffer.from(frame);
      corrupted[bit >> 3] ^= 1 << (bit & 7);
      expect(verifyCrc(corrupted)).toBe(false);
    }
  });

  it("verifyCrc should reject frames shorter than 3 bytes", () => {
    expect(verifyCrc(Buffer.from([0xff, 0xff]))).toBe(false);
  });

  it("isCrcVariant should recognise the variant names", () => {
    expect(isCrcVariant("x25")).toBe(true);
    expect(isCrcVariant("ccitt-false")).toBe(true);
    expect(isCrcVariant("modbus")).toBe(false);
  });
});
