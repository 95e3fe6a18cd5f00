/**
 * CRC-16 checksums used to protect Aurora frames.
 *
 * The protocol appends a CRC-16 to every frame, low byte first. Two named
 * variants are in circulation for this protocol:
 *   - CRC-16/X.25 (reflected 0x1021, init 0xFFFF, xorout 0xFFFF) – default
 *   - CRC-16/CCITT-FALSE (0x1021, init 0xFFFF, no reflection, no xorout)
 */

// ---------- Lookup tables ----------

const X25_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i;
  for (let j = 0; j < 8; j++) {
    crc = crc & 1 ? (crc >>> 1) ^ 0x8408 : crc >>> 1;
  }
  X25_TABLE[i] = crc;
}

const CCITT_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i << 8;
  for (let j = 0; j < 8; j++) {
    crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
  }
  CCITT_TABLE[i] = crc;
}

// ---------- Variants ----------

export type CrcVariant = "x25" | "ccitt-false";

export const CRC_VARIANTS: readonly CrcVariant[] = ["x25", "ccitt-false"];

/** Calculate CRC-16/X.25 over the given bytes. */
export function crc16X25(data: Uint8Array): number {
  let crc = 0xffff;
  for (let i = 0; i < data.length; i++) {
    crc = (crc >>> 8) ^ X25_TABLE[(crc ^ data[i]) & 0xff];
  }
  return (crc ^ 0xffff) & 0xffff;
}

/** Calculate CRC-16/CCITT-FALSE over the given bytes. */
export function crc16CcittFalse(data: Uint8Array): number {
  let crc = 0xffff;
  for (let i = 0; i < data.length; i++) {
    crc = ((crc << 8) & 0xffff) ^ CCITT_TABLE[((crc >>> 8) ^ data[i]) & 0xff];
  }
  return crc;
}

export function crc16(data: Uint8Array, variant: CrcVariant = "x25"): number {
  return variant === "x25" ? crc16X25(data) : crc16CcittFalse(data);
}

/** Return a 2-byte Buffer holding the CRC, low byte first. */
export function getCrc(data: Uint8Array, variant: CrcVariant = "x25"): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16LE(crc16(data, variant), 0);
  return buf;
}

/** Append the CRC to the given data and return the new buffer. */
export function addCrc(data: Uint8Array, variant: CrcVariant = "x25"): Buffer {
  return Buffer.concat([data, getCrc(data, variant)]);
}

/** Verify the trailing CRC of a frame. */
export function verifyCrc(frame: Uint8Array, variant: CrcVariant = "x25"): boolean {
  if (frame.length < 3) return false;
  const computed = getCrc(frame.subarray(0, frame.length - 2), variant);
  return (
    computed[0] === frame[frame.length - 2] &&
    computed[1] === frame[frame.length - 1]
  );
}

export function isCrcVariant(value: string): value is CrcVariant {
  return CRC_VARIANTS.some((v) => v === value);
}
