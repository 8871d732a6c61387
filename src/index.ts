export { RegencyKernel } from './kernel-core/Kernel.js';
export type { KernelOptions, AdvanceOutcome, SessionAdvanceReport, Decision, Denial } from './kernel-core/Kernel.js';
export { ErrorCode, KernelError, isKernelError } from './kernel-core/Errors.js';
export type * from './kernel-core/L0/Ontology.js';
export { Logger, LogLevel, parseLogLevel } from './kernel-core/L0/Logger.js';
export { MutationRequestSchema, SessionSnapshotSchema } from './kernel-core/L0/Schemas.js';
export { checkInvariants, SESSION_INVARIANTS } from './kernel-core/L0/Invariants.js';
export { WorldStateStore } from './kernel-core/L2/State.js';
export { ClaimRegistry } from './kernel-core/L3/Claims.js';
export { OrderTracker, daysRemaining, progressPercent } from './kernel-core/L3/Orders.js';
export type { AdvanceReport, AppliedEffect, EffectWriter } from './kernel-core/L3/Orders.js';
export { DayRuleBook, periodicDelta } from './kernel-core/L3/DayRules.js';
export type { DayRule, DayView, DayRuleReport, RuleEffect, RuleFailure } from './kernel-core/L3/DayRules.js';
export { MutationAuthority, DEFAULT_THRESHOLDS } from './kernel-core/L4/Authority.js';
export type { AuthorityThresholds, MutationOutcome, ApplyResult, Classification } from './kernel-core/L4/Authority.js';
export { Chronicle } from './kernel-core/L5/Audit.js';
export type { ChronicleEntry, ChronicleKind, IEventStore } from './kernel-core/L5/Audit.js';
export { EscalationRouter, parseVerdict } from './kernel-core/L6/Escalation.js';
export { AdvisorIntake, parseProposal } from './kernel-core/L6/AdvisorIntake.js';
export type { ISnapshotRepository, SaveSlot } from './Platform/Ports.js';
export { PlatformError, InfrastructureError, GenerationServiceError, ConfigurationError } from './Platform/Errors.js';
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { SQLiteSnapshotStore } from './infrastructure/persistence/SQLiteSnapshotStore.js';
export { OpenRouterGenerationService } from './infrastructure/generation/OpenRouterGenerationService.js';
export { RegencyServer, statusFor } from './server/Server.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
