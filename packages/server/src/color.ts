export type Rgb = [number, number, number];

const HEX_COLOR = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;

export function isHexColor(value: string): boolean {
  return HEX_COLOR.test(value);
}

export function parseHexColor(value: string): Rgb {
  const match = HEX_COLOR.exec(value);
  if (!match) throw new Error(`not a hex color: ${JSON.stringify(value)}`);

  const digits = match[1];
  const full =
    digits.length === 3
      ? digits
          .split("")
          .map((d) => d + d)
          .join("")
      : digits;
  return [
    parseInt(full.slice(0, 2), 16),
    parseInt(full.slice(2, 4), 16),
    parseInt(full.slice(4, 6), 16),
  ];
}

function toHex(channel: number): string {
  return Math.max(0, Math.min(255, Math.round(channel))).toString(16).padStart(2, "0");
}

/**
 * Blends `from` into `to` by the elapsed fraction. The blend is quadratic, so
 * the color holds near `from` early on and moves quickly near the end.
 */
export function fadeBetween(from: string, to: string, fraction: number): string {
  const f = Math.max(0, Math.min(1, fraction));
  const lam = f * f;
  const a = parseHexColor(from);
  const b = parseHexColor(to);
  return `#${toHex(a[0] * (1 - lam) + b[0] * lam)}${toHex(a[1] * (1 - lam) + b[1] * lam)}${toHex(
    a[2] * (1 - lam) + b[2] * lam
  )}`;
}
