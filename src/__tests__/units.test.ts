import { formatDuration, parseByteSize, parseDuration, toNanoseconds } from "../units";

describe("units", () => {
  describe("parseDuration", () => {
    it("should parse single unit durations", () => {
      expect(parseDuration("30s")).toBe(30_000);
      expect(parseDuration("10s")).toBe(10_000);
      expect(parseDuration("2m")).toBe(120_000);
      expect(parseDuration("1h")).toBe(3_600_000);
      expect(parseDuration("250ms")).toBe(250);
    });

    it("should add up compound durations", () => {
      expect(parseDuration("1m30s")).toBe(90_000);
      expect(parseDuration("1h2m3s4ms")).toBe(3_723_004);
    });

    it("should accept fractions and microseconds", () => {
      expect(parseDuration("1.5s")).toBe(1_500);
      expect(parseDuration("500us")).toBe(0.5);
      expect(parseDuration("1ms500us")).toBe(1.5);
    });

    it("should accept a bare zero", () => {
      expect(parseDuration("0")).toBe(0);
    });

    it("should reject malformed durations", () => {
      expect(() => parseDuration("")).toThrow(RangeError);
      expect(() => parseDuration("30")).toThrow('Invalid duration "30"');
      expect(() => parseDuration("5d")).toThrow(RangeError);
      expect(() => parseDuration("30s10m")).toThrow("units out of order");
      expect(() => parseDuration("1s1s")).toThrow("units out of order");
    });
  });

  describe("formatDuration", () => {
    it("should use the largest units first", () => {
      expect(formatDuration(90_000)).toBe("1m30s");
      expect(formatDuration(1_500)).toBe("1s500ms");
      expect(formatDuration(3_600_000)).toBe("1h");
      expect(formatDuration(10_000)).toBe("10s");
    });

    it("should keep microseconds", () => {
      expect(formatDuration(1.5)).toBe("1ms500us");
      expect(formatDuration(0.25)).toBe("250us");
      expect(formatDuration(1_000.01)).toBe("1s10us");
    });

    it("should parse back to the same duration", () => {
      for (const text of ["1500us", "250us", "1.5ms", "2m0.5s", "10us"]) {
        const ms = parseDuration(text);
        expect(parseDuration(formatDuration(ms))).toBe(ms);
      }
    });

    it("should format zero as 0s", () => {
      expect(formatDuration(0)).toBe("0s");
    });
  });

  describe("parseByteSize", () => {
    it("should use 1024 based units", () => {
      expect(parseByteSize("10m")).toBe(10_485_760);
      expect(parseByteSize("512k")).toBe(524_288);
      expect(parseByteSize("1g")).toBe(1_073_741_824);
      expect(parseByteSize("100")).toBe(100);
    });

    it("should ignore case and a trailing b", () => {
      expect(parseByteSize("10MB")).toBe(10_485_760);
      expect(parseByteSize("64b")).toBe(64);
    });

    it("should reject unknown units", () => {
      expect(() => parseByteSize("10x")).toThrow('Invalid size "10x"');
      expect(() => parseByteSize("")).toThrow(RangeError);
    });
  });

  it("should convert milliseconds to nanoseconds", () => {
    expect(toNanoseconds(30_000)).toBe(30_000_000_000);
    expect(toNanoseconds(0)).toBe(0);
  });
});
