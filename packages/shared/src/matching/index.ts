/**
 * Doctor Registry Matcher
 *
 * Two tiers:
 * 1. Exact lookup by normalized registry number. A hit ends the search.
 * 2. Last-name lookup, preferring rows whose location overlaps the document.
 *
 * No match in either tier is a fraud verdict. Registry errors are not caught
 * here: the workflow's service guard turns them into technical failures.
 */

import { logger } from '../logger';
import { deriveLastName, doctorNameParts, normalizeRegistryNumber } from '../extractors/patterns';
import type { DoctorInfo, DoctorRegistry, DoctorVerdict, RegistryDoctor } from '../types';
import { deriveLocationHint, selectByLocation, type LocationSelectionOptions } from './location';

export type MatchOptions = LocationSelectionOptions;

const NO_MATCH: DoctorVerdict = {
  doctor_found: false,
  fraud_detected: true,
  match_tier: 'NONE',
  matched_record: null,
  match_basis: null,
  name_consistent: null,
};

/**
 * Does the document name carry the registry's last name (and first name, when both are known)?
 */
export function nameMatchesRecord(documentName: string | null, record: RegistryDoctor): boolean {
  const parts = doctorNameParts(documentName);
  if (parts.length === 0) return false;

  const lastName = record.last_name.trim().toUpperCase();
  const firstName = (record.first_name ?? '').trim().toUpperCase();

  const joined = parts.join(' ');
  const hasLastName = joined.includes(lastName);
  if (!firstName || parts.length < 2) return hasLastName;

  return hasLastName && parts.includes(firstName);
}

export async function matchDoctor(
  doctor: DoctorInfo,
  registry: DoctorRegistry,
  options: MatchOptions = {}
): Promise<DoctorVerdict> {
  const registryNumber = normalizeRegistryNumber(doctor.registry_number);

  // Tier 1: exact registry number
  if (registryNumber) {
    const record = await registry.findByRegistryNumber(registryNumber);

    if (record) {
      const nameConsistent = nameMatchesRecord(doctor.full_name, record);
      if (!nameConsistent) {
        logger.warn('Registry number found but document name differs', { registry_number: registryNumber });
      }

      logger.info('Doctor matched by registry number', { registry_number: registryNumber });
      return {
        doctor_found: true,
        fraud_detected: false,
        match_tier: 'EXACT',
        matched_record: record,
        match_basis: 'registry_number',
        name_consistent: nameConsistent,
      };
    }

    logger.warn('Registry number not found in registry', { registry_number: registryNumber });
  }

  // Tier 2: last name, refined by location
  const lastName = deriveLastName(doctor.full_name);
  if (!lastName) {
    logger.warn('No doctor name available for fuzzy match');
    return NO_MATCH;
  }

  const hint = deriveLocationHint(doctor);
  const candidates = await registry.findByLastName(lastName, hint);
  const selection = selectByLocation(candidates, hint, options);

  if (!selection) {
    logger.warn('Doctor not found in registry', {
      candidate_count: candidates.length,
      has_location_hint: Boolean(hint.city || hint.postal_code),
    });
    return NO_MATCH;
  }

  logger.info('Doctor matched by name', {
    candidate_count: candidates.length,
    location_matched: selection.location_matched,
  });

  return {
    doctor_found: true,
    fraud_detected: false,
    match_tier: 'FUZZY',
    matched_record: selection.doctor,
    match_basis: selection.location_matched ? 'name_and_location' : 'name',
    name_consistent: null,
  };
}

export {
  deriveLocationHint,
  hasLocationHint,
  locationOverlaps,
  normalizePlace,
  selectByLocation,
  type LocationSelection,
  type LocationSelectionOptions,
} from './location';
