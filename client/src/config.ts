/**
 * Global constants for the scene replica.
 * All magic numbers live here, nowhere else.
 */

// ── Identity ────────────────────────────────────────────────────
export const APP_NAME = 'SceneSync';
export const DEFAULT_NAMESPACE = 'default';

// ── Ticking ─────────────────────────────────────────────────────
export const DEFAULT_TICK_HZ = 60;
export const MAX_TICK_HZ = 1000;

// ── Mailboxes ───────────────────────────────────────────────────
/** Unbounded: the authority's full-state burst must never be truncated. */
export const DEFAULT_MAILBOX_CAPACITY = Infinity;

// ── Pose staging ────────────────────────────────────────────────
/** Staged poses are retried every cycle until their visual appears. */
export const DEFAULT_MAX_PENDING_POSE_CYCLES = Infinity;

// ── Topics ──────────────────────────────────────────────────────
export const TOPIC_NAMES = {
  scene: 'scene',
  visual: 'visual',
  light: 'light',
  pose: 'pose',
  selection: 'selection',
  publishScene: 'publish_scene',
} as const;

// ── Scene Runtime Config Loading ────────────────────────────────
export interface SceneRuntimeConfig {
  namespace: string;
  tickHz: number;
  mailboxCapacity: number;
  maxPendingPoseCycles: number;
}

/** The part of the runtime config a single scene reads; tick rate belongs to the Engine. */
export type SceneConfig = Omit<SceneRuntimeConfig, 'tickHz'>;

export interface ConfigValidationResult {
  valid: boolean;
  config: SceneRuntimeConfig;
  errors: string[];
}

const DEFAULT_RUNTIME_CONFIG: SceneRuntimeConfig = {
  namespace: DEFAULT_NAMESPACE,
  tickHz: DEFAULT_TICK_HZ,
  mailboxCapacity: DEFAULT_MAILBOX_CAPACITY,
  maxPendingPoseCycles: DEFAULT_MAX_PENDING_POSE_CYCLES,
};

/** Fields that accept a positive integer or Infinity (meaning "no limit"). */
const LIMIT_FIELDS = ['mailboxCapacity', 'maxPendingPoseCycles'] as const;

function isPositiveNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

function isLimit(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (value !== Infinity && !Number.isInteger(value)) {
    errors.push(`${field} must be an integer or Infinity`);
    return false;
  }
  return true;
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 */
export function validateAndLoadConfig(
  overrides: Partial<SceneRuntimeConfig> = {},
): ConfigValidationResult {
  const config: SceneRuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...overrides };
  const errors: string[] = [];

  if (typeof config.namespace !== 'string' || config.namespace.trim().length === 0) {
    errors.push('namespace must be a non-empty string');
  } else if (config.namespace.includes('/')) {
    errors.push(`namespace must not contain '/', got ${config.namespace}`);
  }

  if (isPositiveNumber(config.tickHz, 'tickHz', errors) && config.tickHz > MAX_TICK_HZ) {
    errors.push(`tickHz (${config.tickHz}) must not exceed ${MAX_TICK_HZ}`);
  }

  for (const field of LIMIT_FIELDS) {
    isLimit(config[field], field, errors);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}

/** Load config or throw with every validation error joined. */
export function loadConfigOrThrow(overrides: Partial<SceneRuntimeConfig> = {}): SceneRuntimeConfig {
  const result = validateAndLoadConfig(overrides);
  if (!result.valid) {
    throw new Error(`Invalid scene config: ${result.errors.join('; ')}`);
  }
  return result.config;
}
