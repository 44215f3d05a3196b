/** Default file name for an emitted texture slot. */
export const DEFAULT_EXPORT_PATTERN = '{name}_{frame}.png';

const TOKEN = /{([^:}]+)(?::(0[0-9]+))?}/g;
const EMPTY = '\u0000';

/**
 * Resolves a file name pattern by substituting `{token}` placeholders.
 *
 * `{frame:03}` zero-pads to three digits. A token with no value is dropped
 * together with one adjacent separator (`_` or `-`, or a leading `.`), so
 * `{name}_{frame}.png` becomes `stone.png` for a static texture and
 * `water_2.png` for frame 2 of an animated one.
 *
 * @param pattern The pattern string.
 * @param variables Token values. `undefined`, `null` and `''` count as empty.
 */
export function resolveExportPattern(
    pattern: string,
    variables: Record<string, string | number | null | undefined>,
): string {
    let result = pattern.replace(TOKEN, (_match, name: string, padding: string | undefined) => {
        const value = variables[name];
        if (value === undefined || value === null || value === '') {
            return EMPTY;
        }
        const text = String(value);
        return padding ? text.padStart(parseInt(padding, 10), '0') : text;
    });

    while (result.includes(EMPTY)) {
        const before = result;
        result = result.replace(new RegExp(`[_\\-.]${EMPTY}`), '');
        if (result === before) {
            result = result.replace(new RegExp(`${EMPTY}[_\\-]?`), '');
        }
    }

    return result;
}
