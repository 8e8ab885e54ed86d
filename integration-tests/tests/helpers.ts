/**
 * Test Helpers
 *
 * In-process stand-ins for the analyzer, the doctor registry and the fraud
 * case store, plus builders for analyzer payloads.
 */

import type {
  AnalyzerField,
  DoctorRegistry,
  DocumentAnalyzer,
  FraudCase,
  FraudCaseStore,
  Language,
  LocationHint,
  RawAnalysisResult,
  RegistryDoctor,
} from '@attestation/shared';

/** Reference "today" for every date rule in the suite: 15 March 2026, 10:00 local time */
export const FIXED_NOW = new Date(2026, 2, 15, 10, 0, 0);

export const REGISTERED_DOCTOR: RegistryDoctor = {
  registry_number: '12345-67',
  first_name: 'Jan',
  last_name: 'Peeters',
  address: 'Kerkstraat 1',
  postal_code: '9000',
  city: 'Gent',
};

export const OTHER_PEETERS: RegistryDoctor = {
  registry_number: '76543-21',
  first_name: 'Els',
  last_name: 'Peeters',
  address: 'Meir 20',
  postal_code: '2000',
  city: 'Antwerpen',
};

export function stringField(value: string): AnalyzerField {
  return { type: 'string', valueString: value };
}

export function dateField(value: string): AnalyzerField {
  return { type: 'date', valueDate: value };
}

export function booleanField(value: boolean): AnalyzerField {
  return { type: 'boolean', valueBoolean: value };
}

/**
 * Fields of a clean attestation: signed, past ordered dates, registered doctor.
 */
export function cleanFields(): Record<string, AnalyzerField> {
  return {
    PatientName: stringField('Marie Claes'),
    PatientNationalNumber: stringField('85.07.12-123.45'),
    PatientBirthDate: dateField('1985-07-12'),
    DoctorName: stringField('Dr. Jan Peeters'),
    DoctorRizivNumber: stringField('12345-67'),
    DoctorPostalCodeCity: stringField('9000 Gent'),
    IncapacityStartDate: dateField('2026-03-10'),
    IncapacityEndDate: dateField('2026-03-14'),
    CertificateDate: dateField('2026-03-10'),
    DoctorHasSigned: booleanField(true),
  };
}

export function buildAnalysisResult(
  fields: Record<string, AnalyzerField>,
  markdown?: string
): RawAnalysisResult {
  return {
    id: 'op-test',
    status: 'Succeeded',
    result: {
      analyzerId: 'attestation-analyzer',
      contents: [{ kind: 'document', markdown, fields }],
    },
  };
}

export class StubAnalyzer implements DocumentAnalyzer {
  readonly calls: Array<{ fileName: string; language: Language }> = [];

  constructor(private readonly outcome: RawAnalysisResult | Error) {}

  async analyze(file: Buffer, fileName: string, language: Language): Promise<RawAnalysisResult> {
    this.calls.push({ fileName, language });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

/** Analyzer whose call never settles */
export class HangingAnalyzer implements DocumentAnalyzer {
  analyze(): Promise<RawAnalysisResult> {
    return new Promise<RawAnalysisResult>(() => undefined);
  }
}

export class InMemoryDoctorRegistry implements DoctorRegistry {
  readonly lookups: string[] = [];
  readonly locationHints: (LocationHint | undefined)[] = [];

  constructor(private readonly doctors: RegistryDoctor[] = []) {}

  async findByRegistryNumber(registryNumber: string): Promise<RegistryDoctor | null> {
    this.lookups.push(`number:${registryNumber}`);
    return this.doctors.find((doctor) => doctor.registry_number === registryNumber) ?? null;
  }

  async findByLastName(lastName: string, location?: LocationHint): Promise<RegistryDoctor[]> {
    this.lookups.push(`name:${lastName}`);
    this.locationHints.push(location);
    const needle = lastName.toLowerCase();
    return this.doctors.filter((doctor) => doctor.last_name.toLowerCase().includes(needle));
  }
}

export class FailingDoctorRegistry implements DoctorRegistry {
  constructor(private readonly error: Error) {}

  async findByRegistryNumber(): Promise<RegistryDoctor | null> {
    throw this.error;
  }

  async findByLastName(): Promise<RegistryDoctor[]> {
    throw this.error;
  }
}

export class InMemoryFraudCaseStore implements FraudCaseStore {
  readonly cases: FraudCase[] = [];

  async insertCase(fraudCase: FraudCase): Promise<string> {
    this.cases.push(fraudCase);
    return fraudCase.case_id;
  }
}

/** Store whose insert commits only after a delay */
export class SlowFraudCaseStore extends InMemoryFraudCaseStore {
  constructor(private readonly delayMs: number) {
    super();
  }

  async insertCase(fraudCase: FraudCase): Promise<string> {
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    return super.insertCase(fraudCase);
  }
}

export class FailingFraudCaseStore implements FraudCaseStore {
  constructor(private readonly error: Error) {}

  async insertCase(): Promise<string> {
    throw this.error;
  }
}

/** Error carrying a Node-style errno code */
export function errorWithCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}
