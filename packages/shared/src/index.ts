/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Messages
export { getMessage, type MessageKey, type MessageParams } from './messages';

// Metrics
export {
  register,
  attestationsProcessedCounter,
  doctorMatchCounter,
  fraudCasesCounter,
  analysisDurationHistogram,
  serviceFailuresCounter,
  dbQueryDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateAnalysisResult, validateAttestationResult, type SchemaValidation } from './schemas';

// Outbound service calls
export {
  SERVICE_NAMES,
  ServiceCallError,
  ServiceHttpError,
  ServiceTimeoutError,
  classifyServiceError,
  formatDeadline,
  guardServiceCall,
  type GuardOptions,
  type ServiceFailure,
  type ServiceName,
  type ServiceResult,
} from './service-errors';

// Field extraction
export {
  extractAttestation,
  ATTESTATION_FIELD_MAP,
  readBoolean,
  readDate,
  readString,
  deriveLastName,
  doctorNameParts,
  findDoctorNameInText,
  findRegistryNumber,
  normalizeRegistryNumber,
  stripDoctorTitle,
  type FieldMapping,
  type FieldReader,
  type MappedField,
} from './extractors';

// Business rules
export {
  validateAttestation,
  renderValidationIssues,
  parseDocumentDate,
  formatDisplayDate,
  type ValidationOptions,
} from './validation';

// Doctor registry matching
export {
  matchDoctor,
  nameMatchesRecord,
  deriveLocationHint,
  hasLocationHint,
  locationOverlaps,
  normalizePlace,
  selectByLocation,
  type MatchOptions,
  type LocationSelection,
  type LocationSelectionOptions,
} from './matching';

// Fraud cases
export {
  PRIORITY_WEIGHTS,
  shouldCreateFraudCase,
  computeFraudPriority,
  buildFraudReason,
  buildFraudCase,
  recordFraudCaseIfWarranted,
  type FraudCaseInput,
  type FraudCaseOptions,
} from './fraud';

// Results
export {
  DETAIL_LABELS,
  HTTP_STATUS_BY_FAILURE,
  composeResult,
  composeTechnicalResult,
  errorCategoryFor,
  isAttestationValid,
  type ComposeInput,
} from './results';
