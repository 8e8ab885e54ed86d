/**
 * Fraud Case Recorder
 *
 * Decides whether a document needs human review, scores its priority and
 * writes one case to the store. Higher priority = more urgent.
 *
 *   priority = 50 if the signature is missing
 *            + 30 if the doctor could not be verified
 *            + 10 per other rule failure
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';
import { fraudCasesCounter } from '../metrics';
import { getMessage } from '../messages';
import { renderValidationIssues } from '../validation';
import type {
  DoctorVerdict,
  ExtractedAttestation,
  FraudCase,
  FraudCaseStore,
  Language,
  ValidationIssue,
} from '../types';

export const PRIORITY_WEIGHTS = {
  missingSignature: 50,
  unverifiedDoctor: 30,
  perRuleFailure: 10,
} as const;

export interface FraudCaseInput {
  attestation: ExtractedAttestation;
  issues: readonly ValidationIssue[];
  verdict: DoctorVerdict;
  fileName: string;
  language: Language;
}

export interface FraudCaseOptions {
  submissionChannel: string;
  now?: Date;
}

export function shouldCreateFraudCase(issues: readonly ValidationIssue[], verdict: DoctorVerdict): boolean {
  return verdict.fraud_detected || issues.length > 0;
}

export function computeFraudPriority(
  hasSignature: boolean,
  fraudDetected: boolean,
  issues: readonly ValidationIssue[]
): number {
  // The missing-signature issue is already carried by its own weight
  const otherFailures = issues.filter((issue) => issue.rule !== 'signature_missing').length;

  return (
    (hasSignature ? 0 : PRIORITY_WEIGHTS.missingSignature) +
    (fraudDetected ? PRIORITY_WEIGHTS.unverifiedDoctor : 0) +
    PRIORITY_WEIGHTS.perRuleFailure * otherFailures
  );
}

/**
 * Human-readable reason: the unverified doctor first, then each rule failure.
 */
export function buildFraudReason(
  issues: readonly ValidationIssue[],
  verdict: DoctorVerdict,
  language: Language
): string {
  const reasons: string[] = [];
  if (verdict.fraud_detected) {
    reasons.push(getMessage('fraud_reason_not_found', language));
  }
  reasons.push(...renderValidationIssues(issues, language));
  return reasons.join('; ');
}

export function buildFraudCase(input: FraudCaseInput, options: FraudCaseOptions): FraudCase {
  const { attestation, issues, verdict, fileName, language } = input;

  return {
    case_id: uuidv4(),
    created_at: options.now ?? new Date(),
    patient_name: attestation.patient.full_name,
    doctor_name: attestation.doctor.full_name,
    reason: buildFraudReason(issues, verdict, language),
    priority: computeFraudPriority(attestation.has_signature, verdict.fraud_detected, issues),
    status: 'Open',
    claimed_registry_number: attestation.doctor.registry_number,
    claimed_start_date: attestation.incapacity.start_date,
    claimed_end_date: attestation.incapacity.end_date,
    patient_national_id: attestation.patient.national_id,
    registry_match_status: verdict.doctor_found ? 'FOUND' : 'NOT_FOUND',
    match_tier: verdict.match_tier,
    submission_channel: options.submissionChannel,
    source_filename: fileName,
  };
}

/**
 * Create a fraud case when the verdict or the rules call for one.
 * Returns the stored case ID, or null when no case was needed.
 * Store errors propagate to the caller's service guard.
 */
export async function recordFraudCaseIfWarranted(
  input: FraudCaseInput,
  store: FraudCaseStore,
  options: FraudCaseOptions
): Promise<string | null> {
  if (!shouldCreateFraudCase(input.issues, input.verdict)) {
    return null;
  }

  const fraudCase = buildFraudCase(input, options);
  const caseId = await store.insertCase(fraudCase);

  fraudCasesCounter.inc({ registry_match_status: fraudCase.registry_match_status });
  logger.info('Fraud case created', {
    case_id: caseId,
    priority: fraudCase.priority,
    registry_match_status: fraudCase.registry_match_status,
  });

  return caseId;
}
