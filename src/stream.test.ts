import { describe, it, expect, vi, afterEach } from "vitest";
import { Stream } from "./stream";
import {
  InsufficientBytesError,
  StreamFault,
  VarIntTooLargeError,
} from "./errors";
import { Endian, MaxUint64, MinInt64 } from "./types";

describe("Stream", () => {
  describe("writing", () => {
    it("starts empty", () => {
      const stream = new Stream();
      expect(stream.length).toBe(0);
      expect(stream.offset).toBe(0);
      expect(stream.error).toBeNull();
    });

    it("appends every put in order", () => {
      const stream = new Stream();
      stream.putBool(true);
      stream.putUint8(0xab);
      stream.putInt16(-2);
      stream.putVarInt(-1);
      stream.putString("hi");

      expect(stream.bytes()).toEqual(
        new Uint8Array([0x01, 0xab, 0xff, 0xfe, 0x01, 0x02, 0x68, 0x69])
      );
    });

    it("uses the configured byte order by default", () => {
      const stream = new Stream({ endian: Endian.Little });
      stream.putUint32(0x01020304);
      stream.putUint16(0x0102, Endian.Big);

      expect(stream.bytes()).toEqual(new Uint8Array([4, 3, 2, 1, 1, 2]));
    });

    it("appends raw and length-prefixed bytes", () => {
      const stream = new Stream();
      stream.putBytes(new Uint8Array([9, 8]));
      stream.putLengthPrefixedBytes(new Uint8Array([7]));

      expect(stream.bytes()).toEqual(new Uint8Array([9, 8, 1, 7]));
    });

    it("returns a copy from bytes()", () => {
      const stream = new Stream();
      stream.putUint8(1);
      const snapshot = stream.bytes();
      stream.putUint8(2);

      expect(snapshot).toEqual(new Uint8Array([1]));
      expect(stream.buffer).toEqual(new Uint8Array([1, 2]));
    });
  });

  describe("reading", () => {
    it("reads back what was written on the same stream", () => {
      const stream = new Stream();
      stream.putBool(true);
      stream.putInt8(-5);
      stream.putUint16(0xbeef, Endian.Little);
      stream.putInt32(-100000);
      stream.putUint32(0xdeadbeef);
      stream.putInt64(MinInt64);
      stream.putUint64(MaxUint64, Endian.Little);
      stream.putFloat32(1.5);
      stream.putFloat64(Math.PI, Endian.Little);
      stream.putTriad(0x054321, Endian.Little);
      stream.putVarInt(-300);
      stream.putVarLong(-(2n ** 40n));
      stream.putUnsignedVarInt(300);
      stream.putUnsignedVarLong(2n ** 50n);
      stream.putString("héllo");
      stream.putLengthPrefixedBytes(new Uint8Array([1, 2, 3]));

      expect(stream.getBool()).toBe(true);
      expect(stream.getInt8()).toBe(-5);
      expect(stream.getUint16(Endian.Little)).toBe(0xbeef);
      expect(stream.getInt32()).toBe(-100000);
      expect(stream.getUint32()).toBe(0xdeadbeef);
      expect(stream.getInt64()).toBe(MinInt64);
      expect(stream.getUint64(Endian.Little)).toBe(MaxUint64);
      expect(stream.getFloat32()).toBe(1.5);
      expect(stream.getFloat64(Endian.Little)).toBe(Math.PI);
      expect(stream.getTriad(Endian.Little)).toBe(0x054321);
      expect(stream.getVarInt()).toBe(-300);
      expect(stream.getVarLong()).toBe(-(2n ** 40n));
      expect(stream.getUnsignedVarInt()).toBe(300);
      expect(stream.getUnsignedVarLong()).toBe(2n ** 50n);
      expect(stream.getString()).toBe("héllo");
      expect(stream.getLengthPrefixedBytes()).toEqual(new Uint8Array([1, 2, 3]));

      expect(stream.error).toBeNull();
      expect(stream.remaining).toBe(0);
    });

    it("reads from a preloaded buffer at a starting offset", () => {
      const data = new Uint8Array([0xff, 0x05, 0x68, 0x65, 0x6c, 0x6c, 0x6f]);
      const stream = Stream.from(data, 1);

      expect(stream.getString()).toBe("hello");
      expect(stream.offset).toBe(7);
    });

    it("copies the preloaded buffer", () => {
      const data = new Uint8Array([1, 2]);
      const stream = Stream.from(data);
      data[0] = 9;

      expect(stream.getUint8()).toBe(1);
    });

    it("advances the offset by the bytes consumed", () => {
      const stream = Stream.from(new Uint8Array([0xac, 0x02, 0, 0, 0, 1]));

      expect(stream.getUnsignedVarInt()).toBe(300);
      expect(stream.offset).toBe(2);
      expect(stream.getInt32()).toBe(1);
      expect(stream.offset).toBe(6);
    });

    it("rejects a starting offset past the end", () => {
      expect(() => Stream.from(new Uint8Array([1]), 2)).toThrow(RangeError);
    });

    it("masks the big-endian triad on read but not on write", () => {
      const stream = new Stream();
      stream.putTriad(0xffffff);

      expect(stream.buffer).toEqual(new Uint8Array([0xff, 0xff, 0xff]));
      expect(stream.getTriad()).toBe(0x0fffff);
    });
  });

  describe("fault latch", () => {
    it("latches the first failure and returns the zero value", () => {
      const stream = Stream.from(new Uint8Array([0x01, 0x02]));

      expect(stream.getInt32()).toBe(0);
      expect(stream.error).toBeInstanceOf(StreamFault);
      expect(stream.error?.cause).toBeInstanceOf(InsufficientBytesError);
      expect(stream.error?.offset).toBe(0);
      expect(stream.offset).toBe(0);
    });

    it("records the offset and a snapshot of the buffer", () => {
      const stream = Stream.from(new Uint8Array([0x01, 0x80]));
      stream.getUint8();
      stream.getVarInt();

      expect(stream.error?.offset).toBe(1);
      expect(stream.error?.buffer).toEqual(new Uint8Array([0x01, 0x80]));
      expect(stream.error?.message).toBe(
        "Stream fault at offset 1: Insufficient bytes: needed 1 at offset 2, only 0 available"
      );
    });

    it("short-circuits every later read to its zero value", () => {
      const stream = Stream.from(new Uint8Array([0x01]));
      stream.getUint16();
      const before = stream.error;

      stream.putBytes(new Uint8Array(16).fill(0x01));

      expect(stream.getBool()).toBe(false);
      expect(stream.getUint8()).toBe(0);
      expect(stream.getInt64()).toBe(0n);
      expect(stream.getVarLong()).toBe(0n);
      expect(stream.getFloat64()).toBe(0);
      expect(stream.getString()).toBe("");
      expect(stream.getLengthPrefixedBytes()).toEqual(new Uint8Array([]));
      expect(stream.get(2)).toEqual(new Uint8Array([]));
      expect(stream.offset).toBe(0);
      expect(stream.error).toBe(before);
    });

    it("keeps appending after a fault", () => {
      const stream = Stream.from(new Uint8Array([]));
      stream.getVarInt();
      stream.putUint16(0x0102);
      stream.putString("ok");

      expect(stream.error).not.toBeNull();
      expect(stream.bytes()).toEqual(new Uint8Array([0x01, 0x02, 0x02, 0x6f, 0x6b]));
    });

    it("latches an oversized varint", () => {
      const stream = Stream.from(new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]));

      expect(stream.getUnsignedVarInt()).toBe(0);
      expect(stream.error?.cause).toBeInstanceOf(VarIntTooLargeError);
    });

    it("latches an external error once", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]));
      stream.getUint8();
      stream.setError(new Error("unexpected packet id"));
      stream.setError(new Error("second"));

      expect(stream.error?.message).toBe("Stream fault at offset 1: unexpected packet id");
      expect(stream.getUint8()).toBe(0);
    });

    it("does not latch programming errors", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]));

      expect(() => stream.get(1.5)).toThrow(RangeError);
      expect(stream.error).toBeNull();
    });
  });

  describe("reset", () => {
    it("clears the buffer, the offset and the fault", () => {
      const stream = Stream.from(new Uint8Array([1]));
      stream.getUint8();
      stream.getUint8();
      expect(stream.error).not.toBeNull();

      stream.reset();

      expect(stream.length).toBe(0);
      expect(stream.offset).toBe(0);
      expect(stream.error).toBeNull();

      stream.putUint8(7);
      expect(stream.getUint8()).toBe(7);
    });
  });

  describe("end of buffer", () => {
    it("treats the last byte as the end in legacy mode", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]));
      expect(stream.feof()).toBe(false);

      stream.getUint8();
      expect(stream.feof()).toBe(false);

      stream.getUint8();
      expect(stream.feof()).toBe(true);
      expect(stream.remaining).toBe(1);
    });

    it("reports the end past the last byte in strict mode", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]), 2, { endOfBuffer: "strict" });
      expect(stream.feof()).toBe(false);

      stream.getUint8();
      expect(stream.feof()).toBe(true);
    });

    it("reports an empty stream as ended in both modes", () => {
      expect(new Stream().feof()).toBe(true);
      expect(new Stream({ endOfBuffer: "strict" }).feof()).toBe(true);
    });

    it("does not consult the fault", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]));
      stream.getUint32();

      expect(stream.error).not.toBeNull();
      expect(stream.feof()).toBe(false);
    });
  });

  describe("bulk read", () => {
    it("reads the requested number of bytes", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3, 4]));

      expect(stream.get(3)).toEqual(new Uint8Array([1, 2, 3]));
      expect(stream.offset).toBe(3);
    });

    it("leaves the final byte unread for a negative length in legacy mode", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3, 4]), 1);

      expect(stream.get(-1)).toEqual(new Uint8Array([2, 3]));
      expect(stream.offset).toBe(3);
    });

    it("reads everything left for a negative length in strict mode", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3, 4]), 1, { endOfBuffer: "strict" });

      expect(stream.get(-1)).toEqual(new Uint8Array([2, 3, 4]));
      expect(stream.offset).toBe(4);
    });

    it("returns nothing for a negative length at the end", () => {
      const stream = Stream.from(new Uint8Array([1]), 1);

      expect(stream.get(-1)).toEqual(new Uint8Array([]));
      expect(stream.error).toBeNull();
    });

    it("latches a fault when asking for too many bytes", () => {
      const stream = Stream.from(new Uint8Array([1, 2]));

      expect(stream.get(3)).toEqual(new Uint8Array([]));
      expect(stream.error?.cause).toBeInstanceOf(InsufficientBytesError);
    });

    it("returns a copy of the bytes", () => {
      const stream = Stream.from(new Uint8Array([1, 2]));
      const chunk = stream.get(2);
      stream.reset();
      stream.putBytes(new Uint8Array([9, 9]));

      expect(chunk).toEqual(new Uint8Array([1, 2]));
    });
  });

  describe("buffer access", () => {
    it("moves the offset within range", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]));
      stream.offset = 2;

      expect(stream.getUint8()).toBe(3);
      expect(() => {
        stream.offset = 4;
      }).toThrow(RangeError);
    });

    it("replaces the buffer", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]));
      stream.getUint8();
      stream.setBuffer(new Uint8Array([4, 5]));

      expect(stream.offset).toBe(1);
      expect(stream.getUint8()).toBe(5);
    });

    it("rejects a replacement shorter than the offset", () => {
      const stream = Stream.from(new Uint8Array([1, 2, 3]), 3);

      expect(() => stream.setBuffer(new Uint8Array([1]))).toThrow(RangeError);
    });
  });

  describe("64-bit values as numbers", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("reads safe values", () => {
      const stream = new Stream();
      stream.putInt64(-42n);
      stream.putVarLong(123456789n);

      expect(stream.getInt64AsNumber()).toBe(-42);
      expect(stream.getVarLongAsNumber()).toBe(123456789);
    });

    it("warns once per unsafe value", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const stream = new Stream();
      stream.putVarLong(2n ** 60n);

      expect(stream.getVarLongAsNumber()).toBe(2 ** 60);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("returns zero after a fault", () => {
      const stream = new Stream();
      stream.putUint8(1);

      expect(stream.getInt64AsNumber()).toBe(0);
      expect(stream.error).not.toBeNull();
    });
  });
});
