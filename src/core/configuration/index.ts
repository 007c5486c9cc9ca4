export { Configurator, shouldRunStep } from './configurator.js';
export type { ConfigurationInput, ConfigurationOutcome } from './configurator.js';
export { StepLedger, stepFingerprint, stepLedgerName } from './step-ledger.js';
export type { StepLedgerOptions } from './step-ledger.js';
