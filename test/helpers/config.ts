import type { StackConfig } from "../../src/types/config.js";

/** A complete, valid config rooted at relative paths; pass the temp dir as cwd. */
export function makeConfig(overrides: Partial<StackConfig> = {}): StackConfig {
  return {
    schema_version: "1.0.0",
    project_name: "teststack",
    manifest_path: "docker-compose.yml",
    data_dir: "data",
    backup_dir: "backups",
    log_dir: "logs",
    min_free_disk_gb: 10,
    required_tools: ["docker"],
    required_env: [],
    runtime: { command: ["docker", "compose"] },
    polling: { max_attempts: 30, interval_seconds: 10, log_tail_lines: 50, healthy_pattern: "\\(healthy\\)" },
    services: [{ name: "graph-db" }, { name: "postgres" }, { name: "api" }],
    validation: {
      primary_service: "api",
      health_url: "http://localhost:8001/api/v1/health",
      modules_url: "http://localhost:8001/api/v1/health/modules",
      connectivity_command: ["python", "-m", "app.healthcheck"],
      timeout_seconds: 5,
    },
    schema_init: { service: "api", command: ["python", "-m", "app.schema", "init"] },
    tests: { service: "api", command: ["python", "-m", "pytest", "tests/"] },
    backup: { retain: 5 },
    service_urls: [{ name: "API", url: "http://localhost:8001" }],
    health_endpoints: [{ name: "API health", url: "http://localhost:8001/api/v1/health" }],
    ...overrides,
  };
}
