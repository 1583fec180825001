// Microseconds per unit, the finest resolution compose durations carry
const DurationUnits: Record<string, number> = {
  h: 3_600_000_000,
  m: 60_000_000,
  s: 1_000_000,
  ms: 1_000,
  us: 1,
};

// Longer alternatives first so "ms" is not read as "m"
const DurationSegment = /^(\d+(?:\.\d+)?)(h|ms|m|s|us)/;

/**
 * Parses a compose duration such as "30s", "1m30s" or "500ms"
 * @returns Duration in milliseconds
 */
export function parseDuration(text: string): number {
  const input = text.trim();
  if (input === "0") {
    return 0;
  }
  if (input.length === 0) {
    throw new RangeError("Empty duration");
  }
  let rest = input;
  let totalUs = 0;
  let previousScale = Infinity;
  while (rest.length > 0) {
    const match = DurationSegment.exec(rest);
    if (!match) {
      throw new RangeError(`Invalid duration "${text}"`);
    }
    const scale = DurationUnits[match[2]];
    if (scale >= previousScale) {
      throw new RangeError(`Invalid duration "${text}": units out of order`);
    }
    previousScale = scale;
    totalUs += Number(match[1]) * scale;
    rest = rest.slice(match[0].length);
  }
  return Math.round(totalUs) / 1_000;
}

/**
 * Formats milliseconds as a compose duration, largest units first
 */
export function formatDuration(ms: number): string {
  let remaining = Math.round(ms * 1_000);
  if (remaining <= 0) {
    return "0s";
  }
  let out = "";
  for (const unit of ["h", "m", "s", "ms", "us"]) {
    const scale = DurationUnits[unit];
    const count = Math.floor(remaining / scale);
    if (count > 0) {
      out += `${count}${unit}`;
      remaining -= count * scale;
    }
  }
  return out;
}

const ByteUnits: Record<string, number> = {
  "": 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

/**
 * Parses a runtime size such as "10m" or "512k" (1024-based units)
 * @returns Size in bytes
 */
export function parseByteSize(text: string): number {
  const match = /^(\d+(?:\.\d+)?)\s*([kmg]?)b?$/i.exec(text.trim());
  if (!match) {
    throw new RangeError(`Invalid size "${text}"`);
  }
  return Math.round(Number(match[1]) * ByteUnits[match[2].toLowerCase()]);
}

// Docker Engine API durations are expressed in nanoseconds
export function toNanoseconds(ms: number): number {
  return Math.round(ms * 1_000_000);
}
