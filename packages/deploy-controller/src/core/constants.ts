// Shared constants for the deployment controller

export const MIB = 1024 * 1024;
export const GIB = 1024 * MIB;

export const ENVIRONMENTS = ['development', 'production'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

// Container label marking resources managed by this controller
export const MANAGED_LABEL = 'lean-deploy/managed';
export const SERVICE_LABEL = 'lean-deploy/service';

// Admission thresholds
export const MIN_TOTAL_MEMORY_BYTES = 1536 * MIB;
export const RECOMMENDED_AVAILABLE_MEMORY_BYTES = 1024 * MIB;
export const RECOMMENDED_CPU_CORES = 2;
export const RUNTIME_GROUP = 'docker';

// Build-time caps, independent from the runtime ceiling
export const BUILD_MEMORY_BYTES = 1 * GIB;
export const BUILD_CPUS = 1.5;

// Host reservation applied to every descriptor
export const RESERVED_CPUS = 0.5;
export const RESERVED_MEMORY_BYTES = 256 * MIB;

export const SERVICE_PORT = 8000;
export const NETWORK_NAME = 'app-network';
export const STOP_GRACE_PERIOD_SECONDS = 30;

export const DESCRIPTOR_FILE = 'deployment.descriptor.yml';
export const BUILD_DESCRIPTOR_FILE = 'Dockerfile';
export const ENV_FILE = '.env';
export const BACKUPS_DIR = 'backups';
export const LOGS_DIR = 'logs';
export const BACKUP_INFO_FILE = 'backup_info.json';

// System assessment thresholds
export const MEMORY_USAGE_WARN_PERCENT = 85;
export const LOAD_AVERAGE_WARN = 2.0;

export const DIAGNOSTIC_LOG_LINES = 100;
