// Durations are accepted as seconds, "1h30m"-style strings or ISO-8601 ("PT5M").
// Everything is reduced to whole seconds, the granularity `--timeout` takes.

const ISO_DURATION = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i;
const SHORT_DURATION = /^(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/i;

function num(group: string | undefined): number {
  return group ? Number(group) : 0;
}

export function parseDurationSeconds(input: number | string): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) && input >= 0 ? Math.floor(input) : null;
  }

  const value = input.trim();
  if (value === '') return null;
  if (/^\d+$/.test(value)) return Number(value);

  const iso = ISO_DURATION.exec(value);
  if (iso && value.toUpperCase() !== 'P' && !value.toUpperCase().endsWith('T')) {
    const [, d, h, m, s] = iso;
    return Math.floor(num(d) * 86400 + num(h) * 3600 + num(m) * 60 + num(s));
  }

  const short = SHORT_DURATION.exec(value);
  if (short) {
    const [, h, m, s] = short;
    return num(h) * 3600 + num(m) * 60 + num(s);
  }

  return null;
}
