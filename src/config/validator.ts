import { loadAjv } from "../schema/ajv.js";
import type { StackConfig } from "../types/config.js";

const STRING_LIST = { type: "array", items: { type: "string", minLength: 1 } };
const COMMAND = { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 };
const NAMED_URLS = {
  type: "array",
  items: {
    type: "object",
    required: ["name", "url"],
    properties: {
      name: { type: "string", minLength: 1 },
      url: { type: "string", format: "uri" },
    },
    additionalProperties: false,
  },
};
const EXEC_STEP = {
  type: "object",
  required: ["service", "command"],
  properties: {
    service: { type: "string", minLength: 1 },
    command: COMMAND,
  },
  additionalProperties: false,
};

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "project_name",
    "manifest_path",
    "data_dir",
    "backup_dir",
    "log_dir",
    "min_free_disk_gb",
    "required_tools",
    "required_env",
    "runtime",
    "polling",
    "services",
    "validation",
    "schema_init",
    "tests",
    "backup",
    "service_urls",
    "health_endpoints",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    project_name: { type: "string", pattern: "^[a-z0-9][a-z0-9_-]*$" },
    manifest_path: { type: "string", minLength: 1 },
    data_dir: { type: "string", minLength: 1 },
    backup_dir: { type: "string", minLength: 1 },
    log_dir: { type: "string", minLength: 1 },
    min_free_disk_gb: { type: "number", minimum: 0 },
    required_tools: STRING_LIST,
    required_env: STRING_LIST,
    runtime: {
      type: "object",
      required: ["command"],
      properties: { command: COMMAND },
      additionalProperties: false,
    },
    polling: {
      type: "object",
      required: ["max_attempts", "interval_seconds", "log_tail_lines", "healthy_pattern"],
      properties: {
        max_attempts: { type: "integer", minimum: 1 },
        interval_seconds: { type: "number", minimum: 0 },
        log_tail_lines: { type: "integer", minimum: 1 },
        healthy_pattern: { type: "string", format: "regex" },
      },
      additionalProperties: false,
    },
    services: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["name"],
        properties: {
          name: { type: "string", minLength: 1 },
          health_probe: COMMAND,
          max_attempts: { type: "integer", minimum: 1 },
          poll_interval_seconds: { type: "number", minimum: 0 },
        },
        additionalProperties: false,
      },
    },
    validation: {
      type: "object",
      required: ["primary_service", "health_url", "modules_url", "connectivity_command", "timeout_seconds"],
      properties: {
        primary_service: { type: "string", minLength: 1 },
        health_url: { type: "string", format: "uri" },
        modules_url: { type: "string", format: "uri" },
        connectivity_command: COMMAND,
        timeout_seconds: { type: "number", exclusiveMinimum: 0 },
      },
      additionalProperties: false,
    },
    schema_init: EXEC_STEP,
    tests: EXEC_STEP,
    backup: {
      type: "object",
      required: ["retain"],
      properties: { retain: { type: "integer", minimum: 0 } },
      additionalProperties: false,
    },
    service_urls: NAMED_URLS,
    health_endpoints: NAMED_URLS,
  },
  additionalProperties: false,
};

export type ConfigValidationResult =
  | { valid: true; config: StackConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile<StackConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors, { separator: "; ", dataVar: "config" }) };
}
