/**
 * Current Unix time in seconds, with sub-second precision.
 */
export function nowSeconds(): number {
    return Date.now() / 1000;
}
