const MISSING = "--:--:--.---";

// A few ulps of slack, so 1.001 s prints .001 while 999.999999 ms still prints .999.
const FLOAT_SLACK = 4 * Number.EPSILON;

export function formatElapsed(seconds: number): string {
  const scaled = Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0;
  const totalMs = Math.floor(scaled + scaled * FLOAT_SLACK);
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const secs = totalSeconds % 60;
  const mins = Math.floor(totalSeconds / 60) % 60;
  const hours = Math.floor(totalSeconds / 3600);

  return `${pad(hours, 2)}:${pad(mins, 2)}:${pad(secs, 2)}.${pad(ms, 3)}`;
}

export function formatMissing(): string {
  return MISSING;
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}
