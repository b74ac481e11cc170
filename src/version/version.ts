/**
 * Semantic version triple with a total order.
 *
 * Versions are compared structurally, never as strings: '0.10.0' sorts after
 * '0.9.0'.
 */

import { VersionParseError } from '../lib/errors';

const VERSION_PATTERN = /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

export class Version {
	static readonly ZERO = new Version(0, 0, 0);

	private constructor(
		readonly major: number,
		readonly minor: number,
		readonly patch: number,
	) {}

	static parse(input: string): Version {
		const match = VERSION_PATTERN.exec(input.trim());
		if (!match) {
			throw new VersionParseError(input);
		}
		return new Version(Number(match[1]), Number(match[2]), Number(match[3]));
	}

	static isValid(input: string): boolean {
		return VERSION_PATTERN.test(input.trim());
	}

	static compare(a: Version, b: Version): number {
		return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
	}

	static max(a: Version, b: Version): Version {
		return Version.compare(a, b) >= 0 ? a : b;
	}

	compareTo(other: Version): number {
		return Version.compare(this, other);
	}

	equals(other: Version): boolean {
		return this.compareTo(other) === 0;
	}

	lessThan(other: Version): boolean {
		return this.compareTo(other) < 0;
	}

	lessThanOrEqual(other: Version): boolean {
		return this.compareTo(other) <= 0;
	}

	greaterThan(other: Version): boolean {
		return this.compareTo(other) > 0;
	}

	toString(): string {
		return `${this.major}.${this.minor}.${this.patch}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
