/**
 * viz-palette.ts
 * Deterministic colors and ids for the DOT emitter.
 *
 * Module fill colors are hash-based HSL hues with collision avoidance, so
 * every instance of a module gets the same color on every level and every
 * run. No I/O.
 */

// ---------------------------------------------------------------------------
// Hash + color utilities
// ---------------------------------------------------------------------------

/** FNV-1a 32-bit hash. Deterministic for any string. */
export function fnv1a32(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** Convert HSL (h ∈ [0,360), s,l ∈ [0,100]) to hex color string. */
function hslToHex(h: number, s: number, l: number): string {
  const sN = s / 100;
  const lN = l / 100;
  const a = sN * Math.min(lN, 1 - lN);
  const f = (n: number): number => {
    const k = (n + h / 30) % 12;
    return lN - a * Math.max(Math.min(k - 3, 9 - k, 1), -1);
  };
  const toHex = (x: number): string => Math.round(x * 255).toString(16).padStart(2, '0');
  return '#' + toHex(f(0)) + toHex(f(8)) + toHex(f(4));
}

/**
 * Hands out one hex color per key at a fixed saturation and lightness.
 * A key's starting hue is its hash; taken hues push it along the wheel.
 */
class HueAllocator {
  private readonly _saturation: number;
  private readonly _lightness: number;
  private readonly _hues: number[] = [];
  private readonly _hexes = new Set<string>();

  constructor(saturation: number, lightness: number) {
    this._saturation = saturation;
    this._lightness = lightness;
  }

  take(key: string): string {
    const minDist = 22;
    const step = 13; // prime, walks every hue before repeating

    let hue = fnv1a32(key) % 360;
    for (let i = 0; i < 360 && this._hues.some((h) => circularDist(h, hue) < minDist); i++) {
      hue = (hue + step) % 360;
    }

    // Rounding can still map two hues onto one hex string.
    let hex = hslToHex(hue, this._saturation, this._lightness);
    for (let i = 0; i < 360 && this._hexes.has(hex); i++) {
      hue = (hue + step) % 360;
      hex = hslToHex(hue, this._saturation, this._lightness);
    }

    this._hues.push(hue);
    this._hexes.add(hex);
    return hex;
  }
}

function circularDist(a: number, b: number): number {
  const d = Math.abs(a - b);
  return Math.min(d, 360 - d);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Pastel fill color per module name. Names are allocated in sorted order so
 * the result does not depend on input order.
 */
export function buildModulePalette(moduleNames: readonly string[]): Record<string, string> {
  const hues = new HueAllocator(60, 85);
  const colors: Record<string, string> = {};
  for (const name of [...new Set(moduleNames)].sort()) colors[name] = hues.take(`MOD:${name}`);
  return colors;
}

/** Stable level id: sanitized path plus its FNV-1a hash (`lvl_top_u_core_1a2b3c4d`). */
export function levelId(path: string): string {
  const sanitized = path.replace(/[^A-Za-z0-9_]/g, '_');
  return `lvl_${sanitized}_${fnv1a32(path).toString(16).padStart(8, '0')}`;
}
