#!/usr/bin/env tsx

/**
 * Endpoint Configuration Validation Script
 *
 * Runs the same endpoint loading and validation that happens at startup, so a
 * configuration can be checked in CI or before a rollout.
 *
 * Exit codes:
 * - 0: endpoint configuration valid
 * - 1: endpoint configuration invalid
 */

const SCRIPT_NAME = 'validate-endpoint-config';

async function loadEnvironment(): Promise<void> {
  // Only load dotenv in non-CI environments since CI sets environment variables directly
  if (process.env.CI !== 'true' && process.env.GITHUB_ACTIONS !== 'true') {
    await import('dotenv/config');
  }
}

async function main(): Promise<number> {
  await loadEnvironment();

  const [{ logger }, { loadEndpointGroupsFromEnv }, { toSerializableError }] =
    await Promise.all([
      import('../utils/Logger.js'),
      import('../config/index.js'),
      import('../types/Error.types.js'),
    ]);

  try {
    logger.info(`[${SCRIPT_NAME}] Validating endpoint configuration...`);
    const groups = loadEndpointGroupsFromEnv(process.env, logger);
    logger.info(`[${SCRIPT_NAME}] Endpoint configuration valid: ${groups.length} group(s)`);
    return 0;
  } catch (error) {
    logger.error({
      type: 'config_validation_error',
      scope: 'endpoints',
      message: 'Endpoint configuration validation failed',
      details: toSerializableError(error),
      timestamp: new Date().toISOString(),
      fatal: true,
    });
    return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`[${SCRIPT_NAME}] Unexpected failure:`, error);
    process.exit(1);
  });
