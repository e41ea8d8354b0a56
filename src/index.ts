// Public entry point for embedding the allocation engine

export * from './core/ports';
export * from './core/domain/result';
export { normalizeNric, isValidNric } from './core/domain/identity';
export { InventoryLedger, formatFlatType } from './core/domain/inventory';
export { DEFAULT_ELIGIBILITY, eligibleFlatTypes, isEligibleFor, permittedFlatTypes, preferredFlatType } from './core/domain/eligibility';
export {
  ACTIVE_STATUSES,
  bookFlat,
  decideApplication,
  formatFlatId,
  isActive,
  requestWithdrawal,
  resolveWithdrawal,
  submitApplication,
} from './core/domain/applicationStateMachine';
export { canRegister, checkRosterWindows, createRegistration, decideRegistration } from './core/domain/officerConflicts';
export {
  PROJECT_SORT_KEYS,
  filterApplications,
  filterProjects,
  generateProjectId,
  windowsOverlap,
  type ApplicationFilters,
  type ProjectChanges,
  type ProjectDraft,
  type ProjectFilters,
  type ProjectSortKey,
} from './core/domain/projectCatalog';
export { KeyedLock } from './core/application/KeyedLock';
export {
  AllocationCoordinator,
  type AllocationCoordinatorDeps,
  type ApplicantOverview,
  type RegistrationFilters,
} from './core/application/orchestrator/AllocationCoordinator';
export { createInMemoryRepositories, type InMemoryRepositories } from './infra/services/inMemoryRepositories';
export { CsvPersistence } from './infra/persistence/csvPersistence';
export { ConfigImpl } from './infra/services/Config';
export { buildAppContainer, type AppContainer } from './infra/container';
