import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { SettingsSchema, type Settings } from '@ledger-recon/shared';
import { ValidationError } from '@ledger-recon/core';
import type { Workspace } from '../types.js';

/**
 * Loads config/settings.yaml. A missing or empty file yields the defaults.
 *
 * @throws ValidationError when a setting has the wrong shape
 */
export function loadSettings(workspace: Workspace): Settings {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        return SettingsSchema.parse({});
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content) ?? {};

    const parsed = SettingsSchema.safeParse(data);
    if (!parsed.success) {
        throw new ValidationError(
            `Invalid settings file: ${path}`,
            'settings',
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

/**
 * Maps the per-file-name credentials onto the paths of the files found.
 */
export function credentialsByPath(
    settings: Settings,
    files: ReadonlyArray<{ path: string; filename: string }>
): Record<string, string> {
    const credentials: Record<string, string> = {};
    for (const file of files) {
        const password = settings.credentials[file.filename];
        if (password !== undefined) {
            credentials[file.path] = password;
        }
    }
    return credentials;
}
