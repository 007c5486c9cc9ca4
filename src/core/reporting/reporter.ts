/**
 * Reporter
 *
 * Summarizes a run: overall status, one row per component, failed
 * configuration steps, endpoints, and the credentials generated in this
 * run. Values of secrets that existed before the run are never included.
 */

import type { DeploymentSpec, SecretSpec } from '../types/spec.js';
import type { ConfigStepResult, ReconciliationResult, RunStatus, SecretRecord } from '../types/state.js';
import ReportTable from './table.js';

export interface ReportInput {
  deploymentName: string;
  namespace: string;
  results: readonly ReconciliationResult[];
  steps: readonly ConfigStepResult[];
  secrets: readonly SecretRecord[];
  /** Declarations of the secrets, used for `displayInReport` */
  secretSpecs?: readonly SecretSpec[];
  endpoints: readonly string[];
  /** Error that ended the run early */
  error?: Error;
  startedAt: Date;
  finishedAt: Date;
}

export interface ComponentRow {
  component: string;
  outcome: ReconciliationResult['outcome'];
  detail: string;
}

export interface CredentialEntry {
  secret: string;
  values: Readonly<Record<string, string>>;
}

export interface DeploymentReport {
  deploymentName: string;
  namespace: string;
  status: RunStatus;
  components: ComponentRow[];
  failedSteps: ConfigStepResult[];
  endpoints: string[];
  credentials: CredentialEntry[];
  errors: string[];
  durationMs: number;
}

/**
 * failed: a component failed or was skipped, a fatal step failed, or the
 * run ended with an error. succeeded-with-warnings: only non-fatal steps
 * failed.
 */
export function computeRunStatus(
  results: readonly ReconciliationResult[],
  steps: readonly ConfigStepResult[],
  error?: Error
): RunStatus {
  if (error) {
    return 'failed';
  }
  if (results.some((r) => r.outcome === 'failed' || r.outcome === 'skipped')) {
    return 'failed';
  }
  const failedSteps = steps.filter((s) => s.state === 'skipped-failed');
  if (failedSteps.some((s) => s.fatal)) {
    return 'failed';
  }
  return failedSteps.length > 0 ? 'succeeded-with-warnings' : 'succeeded';
}

/**
 * Public URLs of the route components of a resolved spec
 */
export function routeEndpoints(spec: DeploymentSpec): string[] {
  return spec.components.flatMap((c) => (c.kind === 'route' && c.route ? [`https://${c.route.host}`] : []));
}

export function buildReport(input: ReportInput): DeploymentReport {
  const hidden = new Set(
    (input.secretSpecs ?? []).filter((s) => s.displayInReport === false).map((s) => s.name)
  );

  const errors = input.results.flatMap((r) => (r.outcome === 'failed' && r.error ? [r.error.message] : []));
  if (input.error && !errors.includes(input.error.message)) {
    errors.push(input.error.message);
  }

  return {
    deploymentName: input.deploymentName,
    namespace: input.namespace,
    status: computeRunStatus(input.results, input.steps, input.error),
    components: input.results.map((r) => ({ component: r.component, outcome: r.outcome, detail: r.detail })),
    failedSteps: input.steps.filter((s) => s.state === 'skipped-failed'),
    endpoints: [...input.endpoints],
    credentials: input.secrets
      .filter((s) => s.created && !hidden.has(s.name))
      .map((s) => ({ secret: s.name, values: s.values })),
    errors,
    durationMs: Math.max(input.finishedAt.getTime() - input.startedAt.getTime(), 0),
  };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m${Math.round(seconds - minutes * 60)}s`;
}

export function formatReport(report: DeploymentReport): string {
  const sections: string[] = [
    `Deployment ${report.deploymentName} in namespace ${report.namespace}: ${report.status} (${formatDuration(report.durationMs)})`,
  ];

  const components = new ReportTable({ head: ['Component', 'Outcome', 'Detail'] });
  for (const row of report.components) {
    components.push([row.component, row.outcome, row.detail]);
  }
  sections.push(components.toString());

  if (report.failedSteps.length > 0) {
    const steps = new ReportTable({ head: ['Step', 'Target', 'Fatal', 'Exit code', 'Detail'] });
    for (const step of report.failedSteps) {
      steps.push([step.id, step.target, step.fatal ? 'yes' : 'no', step.exitCode ?? '-', step.detail ?? '']);
    }
    sections.push(`Failed configuration steps:\n${steps.toString()}`);
  }

  if (report.endpoints.length > 0) {
    sections.push(`Endpoints:\n${report.endpoints.map((e) => `  ${e}`).join('\n')}`);
  }

  if (report.credentials.length > 0) {
    const credentials = new ReportTable({ head: ['Secret', 'Key', 'Value'] });
    for (const entry of report.credentials) {
      for (const [key, value] of Object.entries(entry.values)) {
        credentials.push([entry.secret, key, value]);
      }
    }
    sections.push(`Credentials generated in this run (shown once):\n${credentials.toString()}`);
  }

  if (report.errors.length > 0) {
    sections.push(`Errors:\n${report.errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  return sections.join('\n\n');
}
