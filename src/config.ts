import * as core from '@actions/core';
import * as github from '@actions/github';
import { ConfigError } from './errors';
import { DEPLOYMENT_STATES, type ReporterConfig, type StatusPreset } from './types';

const STATUS_PRESETS: readonly StatusPreset[] = ['auto', ...DEPLOYMENT_STATES];
const DEFAULT_TIMEOUT_SECONDS = 30;

function isStatusPreset(value: string): value is StatusPreset {
  return STATUS_PRESETS.some(preset => preset === value);
}

function optional(name: string): string | undefined {
  return core.getInput(name) || undefined;
}

function currentRunUrl(): string | undefined {
  const { serverUrl, runId } = github.context;
  const repository = process.env.GITHUB_REPOSITORY;
  if (!runId || !repository) {
    return undefined;
  }
  return `${serverUrl}/${repository}/actions/runs/${runId}`;
}

export function getConfig(): ReporterConfig {
  const authToken = core.getInput('auth_token', { required: true });
  core.setSecret(authToken);

  const repositoryUrl = core.getInput('repository_url', { required: true });
  const commitHash = core.getInput('commit_hash', { required: true });

  const state = core.getInput('set_specific_status') || 'auto';
  if (!isStatusPreset(state)) {
    throw new ConfigError(
      `Invalid set_specific_status: ${state}. Must be one of: ${STATUS_PRESETS.join(', ')}`
    );
  }

  const timeoutInput = core.getInput('request_timeout');
  const timeoutSeconds = timeoutInput ? Number(timeoutInput) : DEFAULT_TIMEOUT_SECONDS;
  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new ConfigError(`Invalid request_timeout: ${timeoutInput}. Must be a positive number of seconds`);
  }

  return {
    authToken,
    repositoryUrl,
    commitHash,
    apiBaseUrl: optional('api_base_url') ?? github.context.apiUrl,
    state,
    buildUrl: optional('build_url') ?? currentRunUrl(),
    statusIdentifier: optional('status_identifier'),
    description: optional('description'),
    verbose: core.getInput('verbose') ? core.getBooleanInput('verbose') : false,
    buildStatus: optional('build_status') ?? (process.env.BITRISE_BUILD_STATUS || undefined),
    requestTimeoutMs: timeoutSeconds * 1000,
  };
}

export function printConfig(config: ReporterConfig): void {
  const rows: [string, string | number | boolean | undefined][] = [
    ['auth_token', '***'],
    ['repository_url', config.repositoryUrl],
    ['commit_hash', config.commitHash],
    ['api_base_url', config.apiBaseUrl],
    ['set_specific_status', config.state],
    ['build_url', config.buildUrl],
    ['status_identifier', config.statusIdentifier],
    ['description', config.description],
    ['verbose', config.verbose],
    ['build_status', config.buildStatus],
    ['request_timeout', config.requestTimeoutMs / 1000],
  ];

  core.info('Configuration:');
  for (const [name, value] of rows) {
    core.info(`- ${name}: ${value ?? '<unset>'}`);
  }
}
