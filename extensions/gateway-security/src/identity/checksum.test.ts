import { getAddress } from "viem";
import { describe, expect, it } from "vitest";
import { AddressFormatError, ChecksumMismatchError } from "../errors.js";
import { computeChecksum, isValidChecksum, parseAddress, parseValidAddress } from "./checksum.js";

const LOWER = "bab36286672fbdc7b250804bf6d14be0df69fa29";
const CHECKSUMMED = "0xbAB36286672fbdc7B250804bf6D14Be0dF69fa29";

describe("computeChecksum", () => {
  it("mixes case from the keccak hash of the lowered address", () => {
    expect(computeChecksum(LOWER)).toBe(CHECKSUMMED);
  });

  it("accepts prefixed and upper-case input", () => {
    expect(computeChecksum(`0x${LOWER}`)).toBe(CHECKSUMMED);
    expect(computeChecksum(`0x${LOWER.toUpperCase()}`)).toBe(CHECKSUMMED);
  });

  it("is idempotent", () => {
    const once = computeChecksum(LOWER);
    expect(computeChecksum(once)).toBe(once);
  });

  it("leaves digits untouched", () => {
    expect(computeChecksum("1234567890123456789012345678901234567890")).toBe(
      "0x1234567890123456789012345678901234567890",
    );
  });

  it("agrees with viem for arbitrary addresses", () => {
    const addresses = [
      "0x00000000000000000000000000000000000000ff",
      "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd",
      "0x0123456789abcdef0123456789abcdef01234567",
      "0xfedcba9876543210fedcba9876543210fedcba98",
    ];
    for (const address of addresses) {
      expect(computeChecksum(address)).toBe(getAddress(address));
    }
  });
});

describe("isValidChecksum", () => {
  it("accepts the checksum encoding of any address", () => {
    for (const address of [LOWER, "abcdefabcdefabcdefabcdefabcdefabcdefabcd"]) {
      expect(isValidChecksum(computeChecksum(address))).toBe(true);
    }
  });

  it("is case-sensitive", () => {
    expect(isValidChecksum(`0x${LOWER}`)).toBe(false);
    expect(isValidChecksum(CHECKSUMMED.toUpperCase().replace("0X", "0x"))).toBe(false);
  });

  it("rejects an unprefixed address even when its letters are right", () => {
    expect(isValidChecksum(CHECKSUMMED.slice(2))).toBe(false);
  });
});

describe("parseAddress", () => {
  it("returns a well-formed address unchanged", () => {
    expect(parseAddress(`0x${LOWER}`)).toBe(`0x${LOWER}`);
  });

  it("requires the 0x prefix", () => {
    expect(() => parseAddress(LOWER)).toThrow(AddressFormatError);
  });

  it("requires exactly 40 hex characters", () => {
    expect(() => parseAddress(`0x${LOWER.slice(1)}`)).toThrow(AddressFormatError);
    expect(() => parseAddress(`0x${LOWER}00`)).toThrow(AddressFormatError);
    expect(() => parseAddress(`0x${LOWER.slice(1)}g`)).toThrow(AddressFormatError);
  });
});

describe("parseValidAddress", () => {
  it("accepts a checksummed address", () => {
    expect(parseValidAddress(CHECKSUMMED)).toBe(CHECKSUMMED);
  });

  it("rejects a well-formed address with the wrong case", () => {
    expect(() => parseValidAddress(`0x${LOWER}`)).toThrow(ChecksumMismatchError);
  });

  it("reports format problems before checksum problems", () => {
    expect(() => parseValidAddress(LOWER)).toThrow(AddressFormatError);
  });
});
