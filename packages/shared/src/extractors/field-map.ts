/**
 * Analyzer Field Mapping
 *
 * Analyzer field names (as configured on the custom analyzer) mapped onto the
 * canonical attestation attributes. Fields not listed here are ignored.
 */

import type { AnalyzerField } from '../types';

export type FieldReader = 'string' | 'date' | 'boolean';

export interface FieldMapping {
  /** Analyzer field name */
  field: string;
  /** Canonical attribute, as section.attribute */
  target: string;
  reader: FieldReader;
}

export const ATTESTATION_FIELD_MAP = {
  patientName: { field: 'PatientName', target: 'patient.full_name', reader: 'string' },
  patientNationalId: { field: 'PatientNationalNumber', target: 'patient.national_id', reader: 'string' },
  patientBirthDate: { field: 'PatientBirthDate', target: 'patient.birth_date', reader: 'date' },
  patientAddress: { field: 'PatientAddress', target: 'patient.address', reader: 'string' },
  patientPostalCity: { field: 'PatientPostalCodeCity', target: 'patient.postal_city', reader: 'string' },
  doctorName: { field: 'DoctorName', target: 'doctor.full_name', reader: 'string' },
  doctorRegistryNumber: { field: 'DoctorRizivNumber', target: 'doctor.registry_number', reader: 'string' },
  doctorAddress: { field: 'DoctorAddress', target: 'doctor.address', reader: 'string' },
  doctorPostalCity: { field: 'DoctorPostalCodeCity', target: 'doctor.postal_city', reader: 'string' },
  doctorPhone: { field: 'DoctorPhoneNumber', target: 'doctor.phone', reader: 'string' },
  incapacityStart: { field: 'IncapacityStartDate', target: 'incapacity.start_date', reader: 'date' },
  incapacityEnd: { field: 'IncapacityEndDate', target: 'incapacity.end_date', reader: 'date' },
  mayLeaveHome: { field: 'IsAllowedToLeaveHouse', target: 'incapacity.may_leave_home', reader: 'boolean' },
  certificateDate: { field: 'CertificateDate', target: 'certificate_date', reader: 'date' },
  hasSignature: { field: 'DoctorHasSigned', target: 'has_signature', reader: 'boolean' },
  summary: { field: 'Summary', target: 'summary', reader: 'string' },
} as const satisfies Record<string, FieldMapping>;

export type MappedField = keyof typeof ATTESTATION_FIELD_MAP;

const MAPPED_FIELD_NAMES: ReadonlySet<string> = new Set(
  Object.values(ATTESTATION_FIELD_MAP).map((mapping) => mapping.field)
);

export function isMappedField(name: string): boolean {
  return MAPPED_FIELD_NAMES.has(name);
}

/**
 * String value of a field: valueString, then the raw content. Blank means absent.
 */
export function readString(field: AnalyzerField | null | undefined): string | null {
  const value = field?.valueString ?? field?.content;
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Date value of a field: valueDate when the analyzer typed it, else its text.
 */
export function readDate(field: AnalyzerField | null | undefined): string | null {
  const value = field?.valueDate;
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return readString(field);
}

export function readBoolean(field: AnalyzerField | null | undefined): boolean | null {
  const value = field?.valueBoolean;
  return typeof value === 'boolean' ? value : null;
}
