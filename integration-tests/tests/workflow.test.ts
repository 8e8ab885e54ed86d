/**
 * Attestation workflow tests: analyzer -> extractor -> validator -> matcher
 * -> fraud recorder -> composer, with in-process collaborators
 */

import type { AnalyzerField } from '@attestation/shared';
import {
  processAttestation,
  type WorkflowDependencies,
  type WorkflowOptions,
} from '../../services/attestation-api/src/lib/workflow';
import {
  FIXED_NOW,
  FailingDoctorRegistry,
  FailingFraudCaseStore,
  HangingAnalyzer,
  InMemoryDoctorRegistry,
  InMemoryFraudCaseStore,
  REGISTERED_DOCTOR,
  SlowFraudCaseStore,
  StubAnalyzer,
  booleanField,
  buildAnalysisResult,
  cleanFields,
  dateField,
  errorWithCode,
  stringField,
} from './helpers';

const OPTIONS: WorkflowOptions = {
  analyzerTimeoutMs: 1000,
  dbCallTimeoutMs: 1000,
  requireLocationMatch: true,
  submissionChannel: 'Online Portaal',
  now: () => FIXED_NOW,
};

const UPLOAD = { file: Buffer.from('%PDF-1.4 test'), fileName: 'attest.pdf', language: 'nl' as const };

function fieldsWith(overrides: Record<string, AnalyzerField | null>): Record<string, AnalyzerField> {
  const fields = cleanFields();
  for (const [name, value] of Object.entries(overrides)) {
    if (value === null) {
      delete fields[name];
    } else {
      fields[name] = value;
    }
  }
  return fields;
}

function setup(fields: Record<string, AnalyzerField>): {
  deps: WorkflowDependencies;
  registry: InMemoryDoctorRegistry;
  caseStore: InMemoryFraudCaseStore;
} {
  const registry = new InMemoryDoctorRegistry([REGISTERED_DOCTOR]);
  const caseStore = new InMemoryFraudCaseStore();
  return {
    deps: { analyzer: new StubAnalyzer(buildAnalysisResult(fields)), registry, caseStore },
    registry,
    caseStore,
  };
}

describe('Attestation workflow', () => {
  it('should reject an unsigned attestation from a registered doctor and open a case at priority 50', async () => {
    const { deps, caseStore } = setup(fieldsWith({ DoctorHasSigned: booleanField(false) }));

    const result = await processAttestation(UPLOAD, deps, OPTIONS);

    expect(result.valid).toBe(false);
    expect(result.error_category).toBe('validation');
    expect(result.status_code).toBe(200);
    expect(result.details.Fouten).toEqual(['Er ontbreekt een handtekening van de arts op het document']);
    expect(result.details).not.toHaveProperty('Reden');

    expect(caseStore.cases).toHaveLength(1);
    expect(caseStore.cases[0].priority).toBe(50);
    expect(caseStore.cases[0].registry_match_status).toBe('FOUND');
    expect(caseStore.cases[0].match_tier).toBe('EXACT');
    expect(result.details['Zaak ID']).toBe(caseStore.cases[0].case_id);
  });

  it('should flag an unknown doctor as fraud and open a case at priority 30', async () => {
    const { deps, registry, caseStore } = setup(
      fieldsWith({ DoctorRizivNumber: stringField('99999-99'), DoctorPostalCodeCity: stringField('8000 Brugge') })
    );

    const result = await processAttestation(UPLOAD, deps, OPTIONS);

    expect(result.valid).toBe(false);
    expect(result.error_category).toBe('fraud');
    expect(result.message).toBe('Het document is afgekeurd. De arts kon niet worden geverifieerd.');
    expect(result.details['Verificatie arts']).toBe('Niet geverifieerd');
    expect(registry.lookups).toEqual(['number:99999-99', 'name:Peeters']);

    expect(caseStore.cases).toHaveLength(1);
    expect(caseStore.cases[0].priority).toBe(30);
    expect(caseStore.cases[0].registry_match_status).toBe('NOT_FOUND');
    expect(caseStore.cases[0].reason).toBe('Arts kon niet worden geverifieerd als geregistreerde arts');
  });

  it('should approve a clean attestation without opening a case', async () => {
    const { deps, caseStore } = setup(cleanFields());

    const result = await processAttestation(UPLOAD, deps, OPTIONS);

    expect(result.valid).toBe(true);
    expect(result.error_category).toBe('none');
    expect(result.status_code).toBe(200);
    expect(result.message).toBe('Uw afwezigheidsattest is geldig en goedgekeurd.');
    expect(result.details['Verificatie arts']).toBe('RIZIV nummer');
    expect(caseStore.cases).toHaveLength(0);
  });

  it('should reject a future start date even when the doctor matches by name, at priority 10', async () => {
    const { deps, caseStore } = setup(
      fieldsWith({
        IncapacityStartDate: dateField('2026-03-20'),
        IncapacityEndDate: null,
        DoctorRizivNumber: null,
      })
    );

    const result = await processAttestation(UPLOAD, deps, OPTIONS);

    expect(result.valid).toBe(false);
    expect(result.error_category).toBe('validation');
    expect(result.details['Verificatie arts']).toBe('Naam en locatie');
    expect(result.details.Fouten).toEqual(['Startdatum van de ongeschiktheid ligt in de toekomst: 20-03-2026']);

    expect(caseStore.cases).toHaveLength(1);
    expect(caseStore.cases[0].priority).toBe(10);
    expect(caseStore.cases[0].match_tier).toBe('FUZZY');
    expect(caseStore.cases[0].registry_match_status).toBe('FOUND');
  });

  it('should short-circuit on an analyzer timeout', async () => {
    const registry = new InMemoryDoctorRegistry([REGISTERED_DOCTOR]);
    const caseStore = new InMemoryFraudCaseStore();

    const result = await processAttestation(
      UPLOAD,
      { analyzer: new HangingAnalyzer(), registry, caseStore },
      { ...OPTIONS, analyzerTimeoutMs: 20 }
    );

    expect(result).toEqual({
      valid: false,
      message: 'Serviceaanroep mislukt: Azure Content Understanding',
      details: {
        Service: 'Azure Content Understanding',
        'Error Type': 'Time-out',
        'Error Message': 'Azure Content Understanding call timed out after 20 ms',
        timeout_seconds: '0.02',
      },
      error_category: 'technical',
      error_kind: 'timeout',
      status_code: 504,
      timestamp: FIXED_NOW.toISOString(),
    });
    expect(registry.lookups).toEqual([]);
    expect(caseStore.cases).toHaveLength(0);
  });

  it('should pass the upload name and language to the analyzer', async () => {
    const analyzer = new StubAnalyzer(buildAnalysisResult(cleanFields()));

    const result = await processAttestation(
      { ...UPLOAD, language: 'fr' },
      { analyzer, registry: new InMemoryDoctorRegistry([REGISTERED_DOCTOR]), caseStore: new InMemoryFraudCaseStore() },
      OPTIONS
    );

    expect(analyzer.calls).toEqual([{ fileName: 'attest.pdf', language: 'fr' }]);
    expect(result.message).toBe("Votre certificat d'absence est valide et approuvé.");
  });

  it('should report an unreachable registry as a connection failure without opening a case', async () => {
    const caseStore = new InMemoryFraudCaseStore();

    const result = await processAttestation(
      UPLOAD,
      {
        analyzer: new StubAnalyzer(buildAnalysisResult(cleanFields())),
        registry: new FailingDoctorRegistry(errorWithCode('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED')),
        caseStore,
      },
      OPTIONS
    );

    expect(result.error_category).toBe('technical');
    expect(result.error_kind).toBe('connection');
    expect(result.status_code).toBe(503);
    expect(result.details.Service).toBe('Doctor Registry Database');
    expect(result.details.connection_error).toBe('ECONNREFUSED');
    expect(caseStore.cases).toHaveLength(0);
  });

  it('should report a failed case insert as a technical result', async () => {
    const result = await processAttestation(
      UPLOAD,
      {
        analyzer: new StubAnalyzer(buildAnalysisResult(fieldsWith({ DoctorHasSigned: booleanField(false) }))),
        registry: new InMemoryDoctorRegistry([REGISTERED_DOCTOR]),
        caseStore: new FailingFraudCaseStore(new Error('duplicate key value violates unique constraint')),
      },
      OPTIONS
    );

    expect(result.valid).toBe(false);
    expect(result.error_category).toBe('technical');
    expect(result.error_kind).toBe('call');
    expect(result.status_code).toBe(502);
    expect(result.details.Service).toBe('Fraud Case Database');
    expect(result.details).not.toHaveProperty('Fouten');
  });

  it('should wait for a slow case insert instead of reporting a technical failure', async () => {
    const caseStore = new SlowFraudCaseStore(60);

    const result = await processAttestation(
      UPLOAD,
      {
        analyzer: new StubAnalyzer(buildAnalysisResult(fieldsWith({ DoctorHasSigned: booleanField(false) }))),
        registry: new InMemoryDoctorRegistry([REGISTERED_DOCTOR]),
        caseStore,
      },
      { ...OPTIONS, dbCallTimeoutMs: 20 }
    );

    expect(result.error_category).toBe('validation');
    expect(caseStore.cases).toHaveLength(1);
    expect(result.details['Zaak ID']).toBe(caseStore.cases[0].case_id);
  });

  it('should not touch the case store for an analyzer error', async () => {
    const caseStore = new InMemoryFraudCaseStore();

    const result = await processAttestation(
      UPLOAD,
      {
        analyzer: new StubAnalyzer(new Error('HTTP 500 from analyzer')),
        registry: new InMemoryDoctorRegistry([REGISTERED_DOCTOR]),
        caseStore,
      },
      OPTIONS
    );

    expect(result.error_kind).toBe('call');
    expect(result.status_code).toBe(502);
    expect(caseStore.cases).toHaveLength(0);
  });

  it('should turn an unexpected error into a workflow failure', async () => {
    const { deps } = setup(cleanFields());

    const result = await processAttestation(UPLOAD, deps, {
      ...OPTIONS,
      now: () => {
        throw new Error('clock unavailable');
      },
    });

    expect(result.error_category).toBe('technical');
    expect(result.status_code).toBe(502);
    expect(result.details.Service).toBe('Attestation Workflow');
    expect(result.details['Error Message']).toBe('clock unavailable');
  });
});
