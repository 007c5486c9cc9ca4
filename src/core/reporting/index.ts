export { buildReport, computeRunStatus, formatDuration, formatReport, routeEndpoints } from './reporter.js';
export type { ComponentRow, CredentialEntry, DeploymentReport, ReportInput } from './reporter.js';
export { default as ReportTable } from './table.js';
