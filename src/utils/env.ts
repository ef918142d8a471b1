export function getEnv(name: string): string | null {
  const v = process.env[name];
  return v && v.length > 0 ? v : null;
}

// Parse "a-b" (decimal) into an inclusive window
export function parseWindow(raw: string | null): { start: number; end: number } | null {
  if (!raw) return null;
  const m = /^(\d+)-(\d+)$/.exec(raw);
  if (!m) return null;
  const a = parseInt(m[1], 10);
  const b = parseInt(m[2], 10);
  return { start: Math.min(a, b), end: Math.max(a, b) };
}
