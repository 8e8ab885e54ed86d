/**
 * Location Matching for the Fuzzy Registry Tier
 *
 * The document's doctor location ("9000 Gent", or the tail of
 * "Kerkstraat 1, 9000 Gent") is compared with registry rows by postal code
 * or by city text overlap.
 */

import type { DoctorInfo, LocationHint, RegistryDoctor } from '../types';

export interface LocationSelection {
  doctor: RegistryDoctor;
  location_matched: boolean;
}

export interface LocationSelectionOptions {
  /**
   * When a hint exists, keep only candidates overlapping it.
   * When false, a name-only candidate survives without overlap.
   */
  requireLocationMatch?: boolean;
}

const POSTAL_CITY = /^(?:[A-Z]{1,2}-?)?(\d{4,5})\s+(.+)$/i;

/** Lowercase, strip accents and punctuation, collapse spaces. */
export function normalizePlace(value: string | null | undefined): string {
  if (!value) return '';
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function parsePostalCity(value: string): LocationHint {
  const trimmed = value.trim();
  const match = trimmed.match(POSTAL_CITY);
  if (match) {
    return { postal_code: match[1], city: match[2].trim() };
  }
  return { postal_code: null, city: trimmed.length > 0 ? trimmed : null };
}

/**
 * Location hint for a doctor: the postal/city field first, otherwise the
 * part of the address after its last comma.
 */
export function deriveLocationHint(doctor: Pick<DoctorInfo, 'address' | 'postal_city'>): LocationHint {
  if (doctor.postal_city) {
    return parsePostalCity(doctor.postal_city);
  }

  if (doctor.address && doctor.address.includes(',')) {
    const tail = doctor.address.slice(doctor.address.lastIndexOf(',') + 1);
    return parsePostalCity(tail);
  }

  return { postal_code: null, city: null };
}

export function hasLocationHint(hint: LocationHint): boolean {
  return Boolean(hint.postal_code || hint.city);
}

/**
 * True when a registry row shares the hint's postal code, or its city or
 * address text contains the hinted city (or the other way round).
 */
export function locationOverlaps(doctor: RegistryDoctor, hint: LocationHint): boolean {
  if (hint.postal_code && doctor.postal_code && hint.postal_code === doctor.postal_code.trim()) {
    return true;
  }

  const hintCity = normalizePlace(hint.city);
  if (!hintCity) return false;

  const rowCity = normalizePlace(doctor.city);
  if (rowCity && (rowCity.includes(hintCity) || hintCity.includes(rowCity))) {
    return true;
  }

  const rowAddress = normalizePlace(doctor.address);
  return rowAddress.length > 0 && rowAddress.includes(hintCity);
}

/**
 * Choose the surviving candidate among last-name matches.
 */
export function selectByLocation(
  candidates: readonly RegistryDoctor[],
  hint: LocationHint,
  options: LocationSelectionOptions = {}
): LocationSelection | null {
  if (candidates.length === 0) return null;

  const requireLocationMatch = options.requireLocationMatch ?? true;

  if (!hasLocationHint(hint)) {
    return { doctor: candidates[0], location_matched: false };
  }

  const overlapping = candidates.find((candidate) => locationOverlaps(candidate, hint));
  if (overlapping) {
    return { doctor: overlapping, location_matched: true };
  }

  return requireLocationMatch ? null : { doctor: candidates[0], location_matched: false };
}
