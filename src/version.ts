import { InvalidVersionFormat } from "./errors.js";

const PRERELEASE_PATTERN = /\b(alpha|beta|rc|pre|next|canary)\b/;
const DIGITS = /^\d+$/;

export type ParseResult =
  | { ok: true; version: Version }
  | { ok: false; error: InvalidVersionFormat };

const fail = (tag: string, reason: string): ParseResult => ({
  ok: false,
  error: new InvalidVersionFormat(tag, reason)
});

/**
 * A `major.minor.patch[-variant]` image tag.
 *
 * Equality and ordering only look at the numeric triple: `1.2.3-alpha`,
 * `1.2.3-foo` and `1.2.3` all compare equal. Release versus prerelease
 * precedence at the same triple is not modelled.
 */
export class Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly variant: string | null;
  readonly original: string;

  private constructor(original: string, major: number, minor: number, patch: number, variant: string | null) {
    this.original = original;
    this.major = major;
    this.minor = minor;
    this.patch = patch;
    this.variant = variant;
  }

  static tryParse(tag: string): ParseResult {
    const dash = tag.indexOf("-");
    const versionPart = dash === -1 ? tag : tag.slice(0, dash);
    const variant = dash === -1 ? null : tag.slice(dash + 1);

    const parts = versionPart.split(".");
    if (parts.length !== 3) {
      return fail(tag, `expected 3 dot-separated components, got ${parts.length}`);
    }
    // Some images tag as v1.2.3; every "v" in the major component is dropped.
    parts[0] = parts[0].replaceAll("v", "");

    const numbers: number[] = [];
    for (const part of parts) {
      if (!DIGITS.test(part)) {
        return fail(tag, `"${part}" is not a non-negative integer`);
      }
      const num = Number(part);
      if (!Number.isSafeInteger(num)) {
        return fail(tag, `"${part}" is out of range`);
      }
      numbers.push(num);
    }
    const [major, minor, patch] = numbers;
    return { ok: true, version: new Version(tag, major, minor, patch, variant) };
  }

  /** Like {@link Version.tryParse} but throws {@link InvalidVersionFormat}. */
  static parse(tag: string): Version {
    const result = Version.tryParse(tag);
    if (!result.ok) throw result.error;
    return result.version;
  }

  isPrerelease() {
    if (!this.variant) return false;
    return PRERELEASE_PATTERN.test(this.variant);
  }

  compare(other: Version): -1 | 0 | 1 {
    const pairs: Array<[number, number]> = [
      [this.major, other.major],
      [this.minor, other.minor],
      [this.patch, other.patch]
    ];
    for (const [a, b] of pairs) {
      if (a !== b) return a < b ? -1 : 1;
    }
    return 0;
  }

  equals(other: Version) {
    return this.compare(other) === 0;
  }

  isNewerThan(other: Version) {
    return this.compare(other) > 0;
  }

  toString() {
    return this.original;
  }
}

export const parseVersion = (tag: string): ParseResult => Version.tryParse(tag);
