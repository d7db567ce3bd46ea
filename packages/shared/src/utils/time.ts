const NS_PER_MICROSECOND = 1_000n;
const NS_PER_MILLISECOND = 1_000_000n;
const NS_PER_SECOND = 1_000_000_000n;

/**
 * Renders a nanosecond duration the way Go's `time.Duration` prints it,
 * e.g. `812ns`, `1.5µs`, `532.1234ms`, `2m3.004s`, `1h0m0s`.
 */
export function formatDuration(nanoseconds: bigint): string {
  if (nanoseconds < 0n) {
    return `-${formatDuration(-nanoseconds)}`;
  }
  if (nanoseconds === 0n) {
    return '0s';
  }

  if (nanoseconds < NS_PER_MICROSECOND) {
    return `${nanoseconds}ns`;
  }
  if (nanoseconds < NS_PER_MILLISECOND) {
    return `${withFraction(nanoseconds, 3)}µs`;
  }
  if (nanoseconds < NS_PER_SECOND) {
    return `${withFraction(nanoseconds, 6)}ms`;
  }

  const totalSeconds = nanoseconds / NS_PER_SECOND;
  let out = `${totalSeconds % 60n}${fractionDigits(nanoseconds % NS_PER_SECOND, 9)}s`;

  const totalMinutes = totalSeconds / 60n;
  if (totalMinutes > 0n) {
    out = `${totalMinutes % 60n}m${out}`;
    const hours = totalMinutes / 60n;
    if (hours > 0n) {
      out = `${hours}h${out}`;
    }
  }
  return out;
}

export function elapsedSince(startNs: bigint): bigint {
  return process.hrtime.bigint() - startNs;
}

function withFraction(value: bigint, precision: number): string {
  const scale = 10n ** BigInt(precision);
  return `${value / scale}${fractionDigits(value % scale, precision)}`;
}

// Trailing zeros are dropped, and the point too when nothing is left
function fractionDigits(remainder: bigint, precision: number): string {
  const digits = remainder.toString().padStart(precision, '0').replace(/0+$/, '');
  return digits.length > 0 ? `.${digits}` : '';
}
