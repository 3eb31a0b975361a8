import { describe, expect, it } from "vitest";
import { CellType, Grid } from "../src/core/grid";
import { calculateLevelChecksum, FNV64Hasher } from "../src/core/hash";

describe("FNV64Hasher", () => {
  it("returns the offset basis for no input", () => {
    expect(new FNV64Hasher().digest()).toBe("cbf29ce484222325");
  });

  it("matches the FNV-1a reference value for 'a'", () => {
    expect(new FNV64Hasher().updateByte(0x61).digest()).toBe(
      "af63dc4c8601ec8c",
    );
  });

  it("hashes int32 as four little-endian bytes", () => {
    const viaInt = new FNV64Hasher().updateInt32(0x01020304).digest();
    const viaBytes = new FNV64Hasher()
      .updateBytes(new Uint8Array([4, 3, 2, 1]))
      .digest();
    expect(viaInt).toBe(viaBytes);
  });
});

describe("level checksum", () => {
  it("is versioned", () => {
    const checksum = calculateLevelChecksum(new Grid(8, 8));
    expect(checksum).toMatch(/^v1:[0-9a-f]{16}$/);
  });

  it("changes with a single cell", () => {
    const grid = new Grid(8, 8);
    const before = calculateLevelChecksum(grid);
    grid.set(4, 4, CellType.EMPTY);
    expect(calculateLevelChecksum(grid)).not.toBe(before);
  });

  it("changes with the spawn", () => {
    const a = new Grid(8, 8, CellType.HOOKABLE, { x: 1, y: 1 });
    const b = new Grid(8, 8, CellType.HOOKABLE, { x: 1, y: 2 });
    expect(calculateLevelChecksum(a)).not.toBe(calculateLevelChecksum(b));
  });
});
