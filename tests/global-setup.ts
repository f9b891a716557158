/**
 * Vitest global setup.
 *
 * Creates the tmp directory database tests put their files in, and hands
 * back the teardown that removes them.
 */
import { mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';

import globalTeardown from './global-teardown.js';

export default function globalSetup(): () => Promise<void> {

    const tmpDir = join(process.cwd(), 'tmp');

    if (!existsSync(tmpDir)) {

        mkdirSync(tmpDir, { recursive: true });

    }

    return globalTeardown;

}
