// config/timing.ts - Centralized Timing Constants

// =============================================================================
// DURATION PARSING
// =============================================================================

export function parseDuration(value: string): number {
  const match = value.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  const num = match?.[1];
  const unit = match?.[2];
  if (num === undefined || unit === undefined) throw new Error(`Invalid duration: ${value}`);
  const n = parseFloat(num);
  switch (unit.toLowerCase()) {
    case 'ms':
      return n;
    case 's':
      return n * 1000;
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    case 'd':
      return n * 86_400_000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

function getEnvDuration(key: string, defaultMs: number): number {
  const value = process.env[key];
  return value ? parseDuration(value) : defaultMs;
}

function getEnvInt(key: string, defaultValue: number): number {
  return parseInt(process.env[key] || String(defaultValue), 10);
}

// =============================================================================
// BASE TIMING CONSTANTS
// =============================================================================

export const TIMING = {
  // PROVISIONING -- fixed count, fixed delay
  REACHABILITY_RETRIES: getEnvInt('ZATHRAS_TIMING_REACHABILITY_RETRIES', 10),
  REACHABILITY_DELAY_MS: getEnvDuration('ZATHRAS_TIMING_REACHABILITY_DELAY', 20_000), // 20s
  INFRA_APPLY_TIMEOUT_MS: getEnvDuration('ZATHRAS_TIMING_INFRA_APPLY_TIMEOUT', 3_600_000), // 1h
  INFRA_INIT_TIMEOUT_MS: getEnvDuration('ZATHRAS_TIMING_INFRA_INIT_TIMEOUT', 600_000), // 10m
  DEFAULT_CREATE_ATTEMPTS: getEnvInt('ZATHRAS_TIMING_CREATE_ATTEMPTS', 5),

  // TEARDOWN -- destroy is force-killed after this and retried
  DESTROY_TIMEOUT_MS: getEnvDuration('ZATHRAS_TIMING_DESTROY_TIMEOUT', 1_200_000), // 20m
  DESTROY_RETRIES: getEnvInt('ZATHRAS_TIMING_DESTROY_RETRIES', 1),

  // SSH
  SSH_CONNECT_TIMEOUT_S: getEnvInt('ZATHRAS_TIMING_SSH_CONNECT_TIMEOUT_S', 30),
  SSH_COMMAND_TIMEOUT_MS: getEnvDuration('ZATHRAS_TIMING_SSH_COMMAND_TIMEOUT', 1_800_000), // 30m
  REBOOT_SETTLE_MS: getEnvDuration('ZATHRAS_TIMING_REBOOT_SETTLE', 30_000), // 30s
  REBOOT_RETRIES: getEnvInt('ZATHRAS_TIMING_REBOOT_RETRIES', 30),
  REBOOT_POLL_INTERVAL_MS: getEnvDuration('ZATHRAS_TIMING_REBOOT_POLL_INTERVAL', 10_000), // 10s

  // INSTALL -- package manager lock wait grows linearly: base * attempt
  PKG_LOCK_RETRIES: getEnvInt('ZATHRAS_TIMING_PKG_LOCK_RETRIES', 6),
  PKG_LOCK_BASE_DELAY_MS: getEnvDuration('ZATHRAS_TIMING_PKG_LOCK_BASE_DELAY', 10_000), // 10s
  PACKAGE_INSTALL_TIMEOUT_MS: getEnvDuration('ZATHRAS_TIMING_PACKAGE_INSTALL_TIMEOUT', 1_800_000), // 30m

  // TESTS
  TEST_EXEC_TIMEOUT_MS: getEnvDuration('ZATHRAS_TIMING_TEST_EXEC_TIMEOUT', 86_400_000), // 24h
  DOWNLOAD_TIMEOUT_MS: getEnvDuration('ZATHRAS_TIMING_DOWNLOAD_TIMEOUT', 300_000), // 5m
} as const;
