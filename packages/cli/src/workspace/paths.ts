import { join } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    const configDir = join(root, 'config');

    return {
        root,
        imports: join(root, 'imports'),
        config: {
            settingsPath: join(configDir, 'settings.yaml'),
            learnedRulesPath: join(configDir, 'learned-rules.json'),
            resolutionsPath: join(configDir, 'resolutions.json'),
            manifestPath: join(configDir, 'import-manifest.json'),
        },
    };
}
