/** Configuration types for the layered config system (base.yaml ← <env>.yaml ← STACKCTL_* env). */

export type ServiceDefinition = {
  name: string;
  /** Runtime arguments used to query the service's live status. Defaults to `ps <name>`. */
  health_probe?: string[];
  max_attempts?: number;
  poll_interval_seconds?: number;
};

export type PollingConfig = {
  max_attempts: number;
  interval_seconds: number;
  log_tail_lines: number;
  healthy_pattern: string;
};

export type RuntimeConfig = {
  /** Binary plus leading arguments, e.g. ["docker", "compose"] or ["docker-compose"]. */
  command: string[];
};

export type ValidationConfig = {
  primary_service: string;
  health_url: string;
  modules_url: string;
  connectivity_command: string[];
  timeout_seconds: number;
};

export type ExecStepConfig = {
  service: string;
  command: string[];
};

export type BackupConfig = {
  retain: number;
};

export type NamedUrl = {
  name: string;
  url: string;
};

export type StackConfig = {
  schema_version: string;
  project_name: string;
  manifest_path: string;
  data_dir: string;
  backup_dir: string;
  log_dir: string;
  min_free_disk_gb: number;
  required_tools: string[];
  required_env: string[];
  runtime: RuntimeConfig;
  polling: PollingConfig;
  services: ServiceDefinition[];
  validation: ValidationConfig;
  schema_init: ExecStepConfig;
  tests: ExecStepConfig;
  backup: BackupConfig;
  service_urls: NamedUrl[];
  health_endpoints: NamedUrl[];
};
