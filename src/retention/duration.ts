const NANOS_PER_UNIT: Record<string, number> = {
  ns: 1,
  us: 1e3,
  'µs': 1e3, // U+00B5
  'μs': 1e3, // U+03BC
  ms: 1e6,
  s: 1e9,
  m: 60e9,
  h: 3600e9
};

const COMPONENT = /^(\d*)(?:\.(\d*))?(ns|us|µs|μs|ms|s|m|h)/;

/**
 * Parses a duration such as "1h30m", "90s" or "1.5h" into whole seconds,
 * truncating any sub-second remainder. Returns undefined if the text is not a
 * valid duration.
 */
export function parseDurationSeconds(text: string): number | undefined {
  let rest = text;
  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    return undefined;
  }

  let nanos = 0;
  while (rest !== '') {
    const match = COMPONENT.exec(rest);
    if (!match) {
      return undefined;
    }
    const [component, whole, fraction = '', unit] = match;
    if (whole === '' && fraction === '') {
      return undefined;
    }
    const value = Number(`${whole || '0'}.${fraction || '0'}`);
    nanos += Math.round(value * NANOS_PER_UNIT[unit]);
    rest = rest.slice(component.length);
  }

  const seconds = Math.trunc(nanos / 1e9);
  return seconds === 0 ? 0 : sign * seconds;
}

/**
 * Renders whole seconds as a compact duration: "45s", "1m30s", "2h", "1h30m",
 * "1h0m30s".
 */
export function formatDurationSeconds(seconds: number): string {
  if (seconds < 0) {
    return '-' + formatDurationSeconds(-seconds);
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;

  let text: string;
  if (h > 0) {
    text = `${h}h${m}m${s}s`;
  } else if (m > 0) {
    text = `${m}m${s}s`;
  } else {
    return `${s}s`;
  }
  if (text.endsWith('m0s')) {
    text = text.slice(0, -2);
  }
  if (text.endsWith('h0m')) {
    text = text.slice(0, -2);
  }
  return text;
}
