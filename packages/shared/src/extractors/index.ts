/**
 * Attestation Field Extractor
 *
 * Maps the analyzer's fields onto an ExtractedAttestation. Missing fields
 * become null (false for the signature flag); nothing here throws on
 * incomplete input.
 */

import { logger } from '../logger';
import type { AnalyzerField, ExtractedAttestation, RawAnalysisResult } from '../types';
import {
  ATTESTATION_FIELD_MAP as F,
  isMappedField,
  readBoolean,
  readDate,
  readString,
  type MappedField,
} from './field-map';
import {
  findDoctorNameInText,
  findRegistryNumber,
  normalizeRegistryNumber,
  stripDoctorTitle,
} from './patterns';

function firstContent(raw: RawAnalysisResult | null | undefined): {
  fields: Record<string, AnalyzerField>;
  markdown: string | null;
} {
  const content = raw?.result?.contents?.[0];
  return {
    fields: content?.fields ?? {},
    markdown: typeof content?.markdown === 'string' ? content.markdown : null,
  };
}

/**
 * Registry number from the discrete field, or from the free text when the
 * field is absent or holds nothing recognisable.
 */
function extractRegistryNumber(field: AnalyzerField | undefined, markdown: string | null): string | null {
  const fieldValue = readString(field);
  const fromField = normalizeRegistryNumber(fieldValue) ?? findRegistryNumber(fieldValue);
  if (fromField) return fromField;

  const fromText = findRegistryNumber(markdown);
  if (fromText) {
    logger.debug('Registry number recovered from document text');
  }
  return fromText;
}

function extractDoctorName(field: AnalyzerField | undefined, markdown: string | null): string | null {
  const fieldValue = readString(field);
  if (fieldValue) return stripDoctorTitle(fieldValue);
  return findDoctorNameInText(markdown);
}

/**
 * Extract the canonical attestation from an analyzer result.
 */
export function extractAttestation(raw: RawAnalysisResult | null | undefined): ExtractedAttestation {
  const { fields, markdown } = firstContent(raw);
  const field = (key: MappedField): AnalyzerField | undefined => fields[F[key].field];

  if (!raw?.result?.contents?.length) {
    logger.warn('No contents found in analysis result');
  }

  const unmapped = Object.keys(fields).filter((name) => !isMappedField(name));
  if (unmapped.length > 0) {
    logger.debug('Ignoring unmapped analyzer fields', { fields: unmapped });
  }

  const attestation: ExtractedAttestation = {
    patient: {
      full_name: readString(field('patientName')),
      national_id: readString(field('patientNationalId')),
      birth_date: readDate(field('patientBirthDate')),
      address: readString(field('patientAddress')),
      postal_city: readString(field('patientPostalCity')),
    },
    doctor: {
      full_name: extractDoctorName(field('doctorName'), markdown),
      registry_number: extractRegistryNumber(field('doctorRegistryNumber'), markdown),
      address: readString(field('doctorAddress')),
      postal_city: readString(field('doctorPostalCity')),
      phone: readString(field('doctorPhone')),
    },
    incapacity: {
      start_date: readDate(field('incapacityStart')),
      end_date: readDate(field('incapacityEnd')),
      may_leave_home: readBoolean(field('mayLeaveHome')),
    },
    certificate_date: readDate(field('certificateDate')),
    has_signature: readBoolean(field('hasSignature')) ?? false,
    summary: readString(field('summary')),
  };

  logger.info('Extracted attestation fields', {
    field_count: Object.keys(fields).length,
    has_patient_name: attestation.patient.full_name !== null,
    has_doctor_name: attestation.doctor.full_name !== null,
    has_registry_number: attestation.doctor.registry_number !== null,
    has_signature: attestation.has_signature,
  });

  return attestation;
}

export {
  ATTESTATION_FIELD_MAP,
  readBoolean,
  readDate,
  readString,
  type FieldMapping,
  type FieldReader,
  type MappedField,
} from './field-map';
export {
  deriveLastName,
  doctorNameParts,
  findDoctorNameInText,
  findRegistryNumber,
  normalizeRegistryNumber,
  stripDoctorTitle,
} from './patterns';
