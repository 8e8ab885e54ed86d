/**
 * Attestation Workflow
 *
 * extract -> validate -> match doctor -> record fraud case -> compose.
 *
 * Every outbound call goes through guardServiceCall; the first technical
 * failure short-circuits into a technical result and nothing after it runs.
 */

import {
  logger,
  getCorrelationId,
  runWithContextAsync,
  guardServiceCall,
  extractAttestation,
  validateAttestation,
  matchDoctor,
  recordFraudCaseIfWarranted,
  composeResult,
  composeTechnicalResult,
  attestationsProcessedCounter,
  doctorMatchCounter,
  SERVICE_NAMES,
  type AttestationResult,
  type DoctorRegistry,
  type DocumentAnalyzer,
  type FraudCaseStore,
  type Language,
} from '@attestation/shared';

export interface WorkflowDependencies {
  analyzer: DocumentAnalyzer;
  registry: DoctorRegistry;
  caseStore: FraudCaseStore;
}

export interface WorkflowOptions {
  analyzerTimeoutMs: number;
  /** Deadline for registry lookups; case inserts rely on the pool's statement_timeout */
  dbCallTimeoutMs: number;
  requireLocationMatch: boolean;
  submissionChannel: string;
  /** Clock for date rules and timestamps */
  now?: () => Date;
}

export interface AttestationUpload {
  file: Buffer;
  fileName: string;
  language: Language;
}

function recordOutcome(result: AttestationResult, language: Language): void {
  attestationsProcessedCounter.inc({ category: result.error_category, language });
}

async function runWorkflow(
  upload: AttestationUpload,
  deps: WorkflowDependencies,
  options: WorkflowOptions
): Promise<AttestationResult> {
  const { file, fileName, language } = upload;
  const now = options.now ?? (() => new Date());

  // Step 1: document analysis
  logger.info('Step 1: analyzing document', { size_bytes: file.length });
  const analysis = await guardServiceCall(
    SERVICE_NAMES.ANALYZER,
    () => deps.analyzer.analyze(file, fileName, language),
    { timeoutMs: options.analyzerTimeoutMs }
  );
  if (!analysis.ok) {
    return composeTechnicalResult(analysis.failure, language, now());
  }

  // Step 2: field extraction
  const attestation = extractAttestation(analysis.value);

  // Step 3: business rules
  const issues = validateAttestation(attestation, { now: now() });
  logger.info('Step 3: validation complete', {
    issue_count: issues.length,
    rules: issues.map((issue) => issue.rule),
  });

  // Step 4: doctor registry
  const match = await guardServiceCall(
    SERVICE_NAMES.REGISTRY,
    () => matchDoctor(attestation.doctor, deps.registry, { requireLocationMatch: options.requireLocationMatch }),
    { timeoutMs: options.dbCallTimeoutMs }
  );
  if (!match.ok) {
    return composeTechnicalResult(match.failure, language, now());
  }

  const verdict = match.value;
  doctorMatchCounter.inc({ tier: verdict.match_tier });
  logger.info('Step 4: doctor matching complete', {
    match_tier: verdict.match_tier,
    fraud_detected: verdict.fraud_detected,
  });

  // Step 5: fraud case. No client-side deadline: an abandoned insert could
  // still commit, so the pool's statement_timeout bounds it server-side.
  const recorded = await guardServiceCall(SERVICE_NAMES.CASE_STORE, () =>
    recordFraudCaseIfWarranted(
      { attestation, issues, verdict, fileName, language },
      deps.caseStore,
      { submissionChannel: options.submissionChannel, now: now() }
    )
  );
  if (!recorded.ok) {
    return composeTechnicalResult(recorded.failure, language, now());
  }

  // Step 6: response
  return composeResult({
    attestation,
    issues,
    verdict,
    caseId: recorded.value,
    fileName,
    language,
    processedAt: now(),
  });
}

/**
 * Process one uploaded attestation end to end.
 * Never throws: unexpected errors become a technical result for the workflow itself.
 */
export async function processAttestation(
  upload: AttestationUpload,
  deps: WorkflowDependencies,
  options: WorkflowOptions
): Promise<AttestationResult> {
  const context = {
    correlationId: getCorrelationId(),
    fileName: upload.fileName,
    language: upload.language,
  };

  return runWithContextAsync(context, async () => {
    const startTime = Date.now();
    let result: AttestationResult;

    try {
      result = await runWorkflow(upload, deps, options);
    } catch (error) {
      logger.error('Attestation workflow failed unexpectedly', error);
      result = composeTechnicalResult(
        {
          service: SERVICE_NAMES.WORKFLOW,
          kind: 'call',
          message: error instanceof Error ? error.message : String(error),
          details: {},
        },
        upload.language,
        new Date()
      );
    }

    recordOutcome(result, upload.language);
    logger.info('Attestation processed', {
      valid: result.valid,
      error_category: result.error_category,
      status_code: result.status_code,
      duration_ms: Date.now() - startTime,
    });

    return result;
  });
}
