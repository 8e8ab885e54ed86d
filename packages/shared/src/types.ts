/**
 * Shared TypeScript Types
 *
 * Types for the absence-certificate validation workflow, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Languages
// ============================================================================

export const LANGUAGES = ['nl', 'fr', 'en'] as const;

export type Language = (typeof LANGUAGES)[number];

export function isLanguage(value: unknown): value is Language {
  return typeof value === 'string' && (LANGUAGES as readonly string[]).includes(value);
}

/** Lowercases and checks a language code, falling back when it is not supported. */
export function parseLanguage(value: unknown, fallback: Language): Language {
  const candidate = typeof value === 'string' ? value.trim().toLowerCase() : value;
  return isLanguage(candidate) ? candidate : fallback;
}

// ============================================================================
// Document Analyzer Output
// ============================================================================

export interface AnalyzerField {
  type?: string;
  valueString?: string;
  valueDate?: string;
  valueBoolean?: boolean;
  valueNumber?: number;
  content?: string;
  confidence?: number;
}

export interface AnalyzerContent {
  kind?: string;
  markdown?: string;
  fields?: Record<string, AnalyzerField>;
}

/** Operation payload returned by the analyzer once polling reports success. */
export interface RawAnalysisResult {
  id?: string;
  status?: string;
  result?: {
    analyzerId?: string;
    contents?: AnalyzerContent[];
  };
}

// ============================================================================
// Extracted Attestation
// ============================================================================

export interface PatientInfo {
  readonly full_name: string | null;
  readonly national_id: string | null;
  readonly birth_date: string | null;
  readonly address: string | null;
  readonly postal_city: string | null;
}

export interface DoctorInfo {
  readonly full_name: string | null;
  /** Canonical NNNNN-NN form */
  readonly registry_number: string | null;
  readonly address: string | null;
  readonly postal_city: string | null;
  readonly phone: string | null;
}

export interface IncapacityPeriod {
  readonly start_date: string | null;
  readonly end_date: string | null;
  readonly may_leave_home: boolean | null;
}

export interface ExtractedAttestation {
  readonly patient: PatientInfo;
  readonly doctor: DoctorInfo;
  readonly incapacity: IncapacityPeriod;
  readonly certificate_date: string | null;
  readonly has_signature: boolean;
  readonly summary: string | null;
}

// ============================================================================
// Validation
// ============================================================================

export type ValidationRule =
  | 'signature_missing'
  | 'start_date_future'
  | 'end_date_future'
  | 'end_before_start'
  | 'certificate_date_future';

export interface ValidationIssue {
  readonly rule: ValidationRule;
  /** Offending date as dd-MM-yyyy, for date rules */
  readonly date?: string;
}

// ============================================================================
// Doctor Registry
// ============================================================================

export interface RegistryDoctor {
  registry_number: string;
  first_name: string | null;
  last_name: string;
  address: string | null;
  postal_code: string | null;
  city: string | null;
}

export type MatchTier = 'EXACT' | 'FUZZY' | 'NONE';

export type MatchBasis = 'registry_number' | 'name_and_location' | 'name';

export interface DoctorVerdict {
  readonly doctor_found: boolean;
  readonly fraud_detected: boolean;
  readonly match_tier: MatchTier;
  readonly matched_record: RegistryDoctor | null;
  readonly match_basis: MatchBasis | null;
  /** Only set for EXACT matches: does the document name carry the registry's last name? */
  readonly name_consistent: boolean | null;
}

// ============================================================================
// Fraud Cases
// ============================================================================

export type RegistryMatchStatus = 'FOUND' | 'NOT_FOUND';

export interface FraudCase {
  case_id: string;
  created_at: Date;
  patient_name: string | null;
  doctor_name: string | null;
  reason: string;
  priority: number;
  status: 'Open';
  claimed_registry_number: string | null;
  claimed_start_date: string | null;
  claimed_end_date: string | null;
  patient_national_id: string | null;
  registry_match_status: RegistryMatchStatus;
  match_tier: MatchTier;
  submission_channel: string;
  source_filename: string;
}

// ============================================================================
// Result
// ============================================================================

export type ErrorCategory = 'none' | 'validation' | 'fraud' | 'technical';

export type ServiceFailureKind = 'timeout' | 'connection' | 'call';

export type DetailValue = string | string[];

export interface AttestationResult {
  valid: boolean;
  message: string;
  /** Ordered display label -> value; the label set is part of the wire contract */
  details: Record<string, DetailValue>;
  error_category: ErrorCategory;
  error_kind?: ServiceFailureKind;
  status_code: number;
  timestamp: string;
}

// ============================================================================
// Collaborator Ports
// ============================================================================

export interface DocumentAnalyzer {
  analyze(file: Buffer, fileName: string, language: Language): Promise<RawAnalysisResult>;
}

/** Where the document places its doctor, e.g. "9000 Gent" -> 9000 / Gent */
export interface LocationHint {
  postal_code: string | null;
  city: string | null;
}

export interface DoctorRegistry {
  findByRegistryNumber(registryNumber: string): Promise<RegistryDoctor | null>;
  /**
   * Case-insensitive last-name candidates. Rows overlapping the location
   * come first, so a capped result still holds them; the matcher makes the
   * final location decision.
   */
  findByLastName(lastName: string, location?: LocationHint): Promise<RegistryDoctor[]>;
}

export interface FraudCaseStore {
  insertCase(fraudCase: FraudCase): Promise<string>;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
