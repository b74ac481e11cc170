/**
 * Compose-style variable interpolation against .env declarations.
 *
 * Supports ${VAR}, ${VAR:-default} (default when unset or empty),
 * ${VAR-default} (default when unset), $VAR and the $$ escape.
 */

export interface InterpolationResult {
	value: string;
	missing: string[];
}

const TOKEN_PATTERN = /\$(?:\$|\{([A-Za-z_][A-Za-z0-9_]*)(?:(:?-)([^}]*))?\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export function interpolate(text: string, env: Record<string, string>): InterpolationResult {
	const missing: string[] = [];

	const value = text.replace(
		TOKEN_PATTERN,
		(token: string, braced?: string, operator?: string, fallback?: string, bare?: string) => {
			if (token === '$$') {
				return '$';
			}
			const name = braced ?? bare ?? '';
			const current = Object.prototype.hasOwnProperty.call(env, name) ? env[name] : undefined;

			if (operator === ':-') {
				return current === undefined || current === '' ? fallback ?? '' : current;
			}
			if (operator === '-') {
				return current === undefined ? fallback ?? '' : current;
			}
			if (current === undefined) {
				missing.push(name);
				return '';
			}
			return current;
		},
	);

	return { value, missing: [...new Set(missing)] };
}
