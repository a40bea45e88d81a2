/**
 * Formatted console output helpers.
 * The core never prints; everything the user sees goes through here.
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function fail(message: string): void {
    console.error(`\n✖ Error: ${message}`);
}
