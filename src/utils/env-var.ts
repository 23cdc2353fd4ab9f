export type Env = Record<string, string | undefined>;

/**
 * Gets an environment variable for a key.
 * If a default value is provided, it will be returned if the environment variable is nullish or empty.
 * If no default value is provided and the environment variable is nullish or empty, undefined is returned.
 */
export function envVar(env: Env, key: string, defaultValue: string): string;
export function envVar(env: Env, key: string): string | undefined;
export function envVar(env: Env, key: string, defaultValue?: string): string | undefined {
	const value = env[key];
	if (value === undefined || value.trim() === '') return defaultValue;
	return value.trim();
}

/** Reads a numeric variable. Unparseable values are returned as NaN so schema validation can report them */
export function envNumber(env: Env, key: string, defaultValue: number): number {
	const value = envVar(env, key);
	return value === undefined ? defaultValue : Number(value);
}

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

/** Reads a boolean variable. Unrecognised words are returned as-is so schema validation can report them */
export function envBoolean(env: Env, key: string, defaultValue: boolean): boolean | string {
	const value = envVar(env, key);
	if (value === undefined) return defaultValue;
	const word = value.toLowerCase();
	if (TRUE_WORDS.includes(word)) return true;
	if (FALSE_WORDS.includes(word)) return false;
	return value;
}
