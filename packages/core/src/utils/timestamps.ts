// Absorbs float error so that 1.001 s is 1001 ms and not 1000
const EPSILON = 1e-6;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

const splitTime = (seconds: number, unitsPerSecond: number) => {
  const total = Math.floor(Math.max(0, seconds) * unitsPerSecond + EPSILON);
  const fraction = total % unitsPerSecond;
  const wholeSeconds = Math.floor(total / unitsPerSecond);
  return {
    hours: Math.floor(wholeSeconds / 3600),
    minutes: Math.floor((wholeSeconds % 3600) / 60),
    seconds: wholeSeconds % 60,
    fraction,
  };
};

/** `HH:MM:SS,mmm`, truncated to the millisecond */
export function formatSrtTime(seconds: number): string {
  const t = splitTime(seconds, 1000);
  return `${pad(t.hours)}:${pad(t.minutes)}:${pad(t.seconds)},${pad(t.fraction, 3)}`;
}

/** `HH:MM:SS.mmm`, truncated to the millisecond */
export function formatVttTime(seconds: number): string {
  const t = splitTime(seconds, 1000);
  return `${pad(t.hours)}:${pad(t.minutes)}:${pad(t.seconds)}.${pad(t.fraction, 3)}`;
}

/** `H:MM:SS.cc`, truncated to the centisecond */
export function formatAssTime(seconds: number): string {
  const t = splitTime(seconds, 100);
  return `${t.hours}:${pad(t.minutes)}:${pad(t.seconds)}.${pad(t.fraction)}`;
}
