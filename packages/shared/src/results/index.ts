/**
 * Result Composer
 *
 * Builds the AttestationResult the UI consumes. The detail labels and their
 * order are part of the wire contract; values are localized.
 */

import { format } from 'date-fns';
import { getMessage } from '../messages';
import { renderValidationIssues } from '../validation';
import type { ServiceFailure } from '../service-errors';
import type {
  AttestationResult,
  DetailValue,
  DoctorVerdict,
  ErrorCategory,
  ExtractedAttestation,
  Language,
  MatchTier,
  ServiceFailureKind,
  ValidationIssue,
} from '../types';

export const DETAIL_LABELS = {
  fileName: 'Bestandsnaam',
  processedAt: 'Verwerkt op',
  status: 'Status',
  patient: 'Patiënt',
  nationalId: 'Rijksregisternummer',
  birthDate: 'Geboortedatum',
  patientAddress: 'Adres patiënt',
  patientPostalCity: 'Postcode en gemeente patiënt',
  doctor: 'Arts',
  registryNumber: 'RIZIV Nummer',
  doctorAddress: 'Adres arts',
  doctorPostalCity: 'Postcode en gemeente arts',
  doctorPhone: 'Telefoonnummer arts',
  verification: 'Verificatie arts',
  caseId: 'Zaak ID',
  incapacityFrom: 'Onmogelijkheid vanaf',
  incapacityTo: 'Onmogelijkheid tot',
  certificateDate: 'Datum attest',
  summary: 'Samenvatting',
  mayLeaveHome: 'Mag huis verlaten',
  warnings: 'Waarschuwingen',
  signature: 'Handtekening',
  reason: 'Reden',
  errors: 'Fouten',
  fileSize: 'Bestandsgrootte',
  service: 'Service',
  errorType: 'Error Type',
  errorMessage: 'Error Message',
} as const;

export const HTTP_STATUS_BY_FAILURE: Record<ServiceFailureKind, number> = {
  call: 502,
  connection: 503,
  timeout: 504,
};

const ERROR_TYPE_MESSAGES = {
  call: 'error_type_call',
  connection: 'error_type_connection',
  timeout: 'error_type_timeout',
} as const satisfies Record<ServiceFailureKind, string>;

export interface ComposeInput {
  attestation: ExtractedAttestation;
  issues: readonly ValidationIssue[];
  verdict: DoctorVerdict;
  caseId: string | null;
  fileName: string;
  language: Language;
  processedAt?: Date;
}

const TIER_MESSAGES = {
  EXACT: 'match_tier_exact',
  FUZZY: 'match_tier_fuzzy',
  NONE: 'match_tier_none',
} as const satisfies Record<MatchTier, string>;

export function isAttestationValid(issues: readonly ValidationIssue[], verdict: DoctorVerdict): boolean {
  return issues.length === 0 && verdict.doctor_found;
}

export function errorCategoryFor(issues: readonly ValidationIssue[], verdict: DoctorVerdict): ErrorCategory {
  if (verdict.fraud_detected) return 'fraud';
  if (issues.length > 0) return 'validation';
  return 'none';
}

function formatProcessedAt(date: Date): string {
  return format(date, 'dd-MM-yyyy HH:mm:ss');
}

/**
 * Verification notes shown on approved documents.
 */
function verificationWarnings(input: ComposeInput): string[] {
  const { verdict, attestation, language } = input;
  const warnings: string[] = [];
  const doctorName = attestation.doctor.full_name ?? '';

  switch (verdict.match_basis) {
    case 'registry_number':
      warnings.push(
        getMessage('doctor_verified_registry', language, { riziv: attestation.doctor.registry_number ?? '' })
      );
      break;
    case 'name_and_location':
      warnings.push(getMessage('doctor_verified_name_city', language, { name: doctorName }));
      break;
    case 'name':
      warnings.push(getMessage('doctor_verified_name', language, { name: doctorName }));
      break;
    default:
      break;
  }

  if (verdict.name_consistent === false && verdict.matched_record) {
    const record = verdict.matched_record;
    warnings.push(
      getMessage('doctor_name_mismatch', language, {
        doc_name: doctorName,
        db_name: [record.first_name, record.last_name].filter(Boolean).join(' '),
      })
    );
  }

  return warnings;
}

export function composeResult(input: ComposeInput): AttestationResult {
  const { attestation, issues, verdict, caseId, fileName, language } = input;
  const processedAt = input.processedAt ?? new Date();
  const { patient, doctor, incapacity } = attestation;
  const L = DETAIL_LABELS;

  const valid = isAttestationValid(issues, verdict);
  const category = errorCategoryFor(issues, verdict);
  const unknown = getMessage('unknown', language);

  const details: Record<string, DetailValue> = {
    [L.fileName]: fileName,
    [L.processedAt]: formatProcessedAt(processedAt),
    [L.status]: getMessage(valid ? 'status_approved' : 'status_rejected', language),
    [L.patient]: patient.full_name ?? unknown,
    [L.nationalId]: patient.national_id ?? '',
    [L.birthDate]: patient.birth_date ?? '',
    [L.patientAddress]: patient.address ?? '',
    [L.patientPostalCity]: patient.postal_city ?? '',
    [L.doctor]: doctor.full_name ?? unknown,
    [L.registryNumber]: doctor.registry_number ?? getMessage('not_found', language),
    [L.doctorAddress]: doctor.address ?? '',
    [L.doctorPostalCity]: doctor.postal_city ?? '',
    [L.doctorPhone]: doctor.phone ?? '',
    [L.verification]: getMessage(TIER_MESSAGES[verdict.match_tier], language),
  };

  if (caseId) details[L.caseId] = caseId;
  if (incapacity.start_date) details[L.incapacityFrom] = incapacity.start_date;
  if (incapacity.end_date) details[L.incapacityTo] = incapacity.end_date;
  if (attestation.certificate_date) details[L.certificateDate] = attestation.certificate_date;
  if (attestation.summary) details[L.summary] = attestation.summary;
  if (incapacity.may_leave_home !== null) {
    details[L.mayLeaveHome] = getMessage(incapacity.may_leave_home ? 'yes' : 'no', language);
  }

  if (valid) {
    const warnings = verificationWarnings(input);
    if (warnings.length > 0) details[L.warnings] = warnings;

    return {
      valid: true,
      message: getMessage('result_valid', language),
      details,
      error_category: category,
      status_code: 200,
      timestamp: processedAt.toISOString(),
    };
  }

  details[L.signature] = getMessage(attestation.has_signature ? 'yes' : 'no', language);

  if (verdict.fraud_detected) {
    details[L.reason] = getMessage('fraud_reason_not_found', language);
  }
  if (issues.length > 0) {
    details[L.errors] = renderValidationIssues(issues, language);
  }

  return {
    valid: false,
    message: getMessage(verdict.fraud_detected ? 'result_fraud' : 'result_invalid', language),
    details,
    error_category: category,
    status_code: 200,
    timestamp: processedAt.toISOString(),
  };
}

/**
 * Result for a request that could not be judged because a collaborator failed.
 */
export function composeTechnicalResult(
  failure: ServiceFailure,
  language: Language,
  processedAt: Date = new Date()
): AttestationResult {
  const L = DETAIL_LABELS;
  const details: Record<string, DetailValue> = {
    [L.service]: failure.service,
    [L.errorType]: getMessage(ERROR_TYPE_MESSAGES[failure.kind], language),
    [L.errorMessage]: failure.message,
  };

  for (const [key, value] of Object.entries(failure.details)) {
    details[key] = String(value);
  }

  return {
    valid: false,
    message: getMessage('service_call_failed', language, { service: failure.service }),
    details,
    error_category: 'technical',
    error_kind: failure.kind,
    status_code: HTTP_STATUS_BY_FAILURE[failure.kind],
    timestamp: processedAt.toISOString(),
  };
}
