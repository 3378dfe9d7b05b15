import path from 'path';
import cloneDeep from 'lodash/cloneDeep.js';
import { ScheduleType, UserRole } from '../types/index.js';
import { ConfigurationError } from '../errors/MonitorError.js';

/**
 * Centralized configuration for the inactivity monitor
 */
export interface MonitorConfig {
  monitoring: {
    thresholdDays: number;
    eligibleRoles: UserRole[];
  };
  dispatch: {
    concurrency: number;
    subject: string;
  };
  mail: {
    smtpUrl?: string;
    host?: string;
    port: number;
    secure: boolean;
    user?: string;
    password?: string;
    from: string;
    fromName: string;
    timeoutMs: number;
  };
  storage: {
    databasePath: string;
    reportDir: string;
    outboxDir: string;
  };
  schedule: {
    type: ScheduleType;
    expression: string;
  };
  diagnostics: {
    enabled: boolean;
    sampleSize: number;
  };
}

const DEFAULT_STORAGE_PATH = 'data';

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  monitoring: {
    thresholdDays: 14,
    eligibleRoles: [UserRole.STUDENT]
  },
  dispatch: {
    concurrency: 5,
    subject: 'We miss you in your online courses!'
  },
  mail: {
    port: 587,
    secure: false,
    from: 'no-reply@lms.local',
    fromName: 'LMS Notifications',
    timeoutMs: 15000
  },
  storage: {
    databasePath: path.join(DEFAULT_STORAGE_PATH, 'lms.db'),
    reportDir: path.join(DEFAULT_STORAGE_PATH, 'reports'),
    outboxDir: path.join(DEFAULT_STORAGE_PATH, 'outbox')
  },
  schedule: {
    type: 'daily',
    expression: '02:00'
  },
  diagnostics: {
    enabled: false,
    sampleSize: 5
  }
};

export type ConfigOverrides = {
  [K in keyof MonitorConfig]?: Partial<MonitorConfig[K]>;
};

export interface EnvReadResult {
  overrides: ConfigOverrides;
  errors: string[];
}

const ROLE_VALUES: readonly string[] = Object.values(UserRole);

function isUserRole(value: string): value is UserRole {
  return ROLE_VALUES.includes(value);
}

function isScheduleType(value: string): value is ScheduleType {
  return value === 'daily' || value === 'weekly' || value === 'interval';
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : NaN;
}

function readBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim().toLowerCase() === 'true';
}

function readString(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function compact<T extends object>(section: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in section) {
    if (section[key] !== undefined) {
      result[key] = section[key];
    }
  }
  return result;
}

/**
 * Build configuration overrides from environment variables. Unset variables
 * leave the defaults in place; malformed numbers surface in validateConfig(),
 * unknown roles and schedule types in `errors`.
 */
export function readMonitorEnv(env: NodeJS.ProcessEnv): EnvReadResult {
  const errors: string[] = [];
  const storagePath = readString(env.STORAGE_PATH) ?? DEFAULT_STORAGE_PATH;

  let eligibleRoles: UserRole[] | undefined;
  const rawRoles = readString(env.MONITOR_ELIGIBLE_ROLES);
  if (rawRoles !== undefined) {
    eligibleRoles = [];
    for (const role of rawRoles.split(',').map((r) => r.trim().toLowerCase())) {
      if (role.length === 0) continue;
      if (isUserRole(role)) {
        eligibleRoles.push(role);
      } else {
        errors.push(`Unknown role: ${role}`);
      }
    }
  }

  let scheduleType: ScheduleType | undefined;
  const rawScheduleType = readString(env.MONITOR_SCHEDULE_TYPE)?.toLowerCase();
  if (rawScheduleType !== undefined) {
    if (isScheduleType(rawScheduleType)) {
      scheduleType = rawScheduleType;
    } else {
      errors.push(`Unsupported schedule type: ${rawScheduleType}`);
    }
  }

  const overrides: ConfigOverrides = {
    monitoring: compact({
      thresholdDays: readInt(env.INACTIVITY_THRESHOLD_DAYS),
      eligibleRoles
    }),
    dispatch: compact({
      concurrency: readInt(env.DISPATCH_CONCURRENCY),
      subject: readString(env.MAIL_SUBJECT)
    }),
    mail: compact({
      smtpUrl: readString(env.SMTP_URL),
      host: readString(env.SMTP_HOST),
      port: readInt(env.SMTP_PORT),
      secure: readBool(env.SMTP_SECURE),
      user: readString(env.SMTP_USER),
      password: env.SMTP_PASSWORD || undefined,
      from: readString(env.MAIL_FROM),
      fromName: readString(env.MAIL_FROM_NAME),
      timeoutMs: readInt(env.SMTP_TIMEOUT_MS)
    }),
    storage: {
      databasePath: readString(env.DATABASE_PATH) ?? path.join(storagePath, 'lms.db'),
      reportDir: readString(env.REPORT_DIR) ?? path.join(storagePath, 'reports'),
      outboxDir: readString(env.OUTBOX_DIR) ?? path.join(storagePath, 'outbox')
    },
    schedule: compact({
      type: scheduleType,
      expression: readString(env.MONITOR_SCHEDULE)
    }),
    diagnostics: compact({
      enabled: readBool(env.LMS_ENABLE_DIAGNOSTICS),
      sampleSize: readInt(env.DIAGNOSTICS_SAMPLE_SIZE)
    })
  };

  return { overrides, errors };
}

/**
 * Configuration manager for the inactivity monitor
 */
export class MonitorConfigManager {
  private readonly config: MonitorConfig;
  private readonly sourceErrors: string[];

  constructor(overrides?: ConfigOverrides, sourceErrors: string[] = []) {
    this.config = this.mergeConfigs(DEFAULT_MONITOR_CONFIG, overrides || {});
    this.sourceErrors = [...sourceErrors];
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): MonitorConfigManager {
    const { overrides, errors } = readMonitorEnv(env);
    return new MonitorConfigManager(overrides, errors);
  }

  /**
   * Load configuration from the environment and fail fast when it is invalid
   */
  static loadOrThrow(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
    const manager = MonitorConfigManager.fromEnv(env);
    const { valid, errors } = manager.validateConfig();
    if (!valid) {
      throw new ConfigurationError(errors);
    }
    return manager.getConfig();
  }

  /**
   * Get the complete configuration
   */
  getConfig(): MonitorConfig {
    return cloneDeep(this.config);
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [...this.sourceErrors];
    const { monitoring, dispatch, mail, schedule, diagnostics } = this.config;

    if (!Number.isInteger(monitoring.thresholdDays) || monitoring.thresholdDays <= 0) {
      errors.push('Inactivity threshold must be a positive whole number of days');
    }

    if (monitoring.eligibleRoles.length === 0) {
      errors.push('At least one eligible role is required');
    }
    for (const role of monitoring.eligibleRoles) {
      if (!isUserRole(role)) {
        errors.push(`Unknown role: ${role}`);
      }
    }

    if (!Number.isInteger(dispatch.concurrency) || dispatch.concurrency <= 0) {
      errors.push('Dispatch concurrency must be greater than 0');
    }

    if (!Number.isInteger(mail.port) || mail.port <= 0 || mail.port > 65535) {
      errors.push('SMTP port must be between 1 and 65535');
    }

    if (!Number.isInteger(mail.timeoutMs) || mail.timeoutMs <= 0) {
      errors.push('SMTP timeout must be greater than 0');
    }

    if (!isScheduleType(schedule.type)) {
      errors.push(`Unsupported schedule type: ${schedule.type}`);
    }

    if (!Number.isInteger(diagnostics.sampleSize) || diagnostics.sampleSize < 0) {
      errors.push('Diagnostics sample size must not be negative');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  private mergeConfigs(base: MonitorConfig, override: ConfigOverrides): MonitorConfig {
    const result = cloneDeep(base);

    if (override.monitoring) {
      result.monitoring = { ...result.monitoring, ...override.monitoring };
    }
    if (override.dispatch) {
      result.dispatch = { ...result.dispatch, ...override.dispatch };
    }
    if (override.mail) {
      result.mail = { ...result.mail, ...override.mail };
    }
    if (override.storage) {
      result.storage = { ...result.storage, ...override.storage };
    }
    if (override.schedule) {
      result.schedule = { ...result.schedule, ...override.schedule };
    }
    if (override.diagnostics) {
      result.diagnostics = { ...result.diagnostics, ...override.diagnostics };
    }

    return result;
  }
}

/**
 * Read and validate the monitor configuration from the environment.
 * Throws ConfigurationError listing every problem found.
 */
export function loadMonitorConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  return MonitorConfigManager.loadOrThrow(env);
}
