/**
 * Environment Detection
 *
 * Detects whether output goes to a person or a machine. The logger picks
 * its default format from this.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'TRAVIS',
    'JENKINS_URL',
    'BUILDKITE',
    'TEAMCITY_VERSION',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - LOCKSTEP_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY available
 *
 * @example
 * ```typescript
 * const format = isCi() ? 'text' : 'json'
 * ```
 */
export function isCi(): boolean {

    // Explicit headless flag
    if (process.env['LOCKSTEP_HEADLESS'] === 'true') {

        return true;

    }

    // Check CI environment variables
    for (const envVar of CI_ENV_VARS) {

        if (process.env[envVar]) {

            return true;

        }

    }

    // No TTY available (piped output, non-interactive)
    if (!process.stdout.isTTY) {

        return true;

    }

    return false;

}
