/**
 * Attestation Extraction Patterns
 *
 * Regular expressions for doctor registry (RIZIV/INAMI) numbers and
 * doctor names, used on discrete analyzer fields and on the document's
 * free text when a discrete field is missing.
 *
 * Registry numbers are accepted as:
 * - NNNNN-NN  (12345-67)
 * - NNNNN/NN  (12345/67)
 * - NNNNNNN   (1234567)
 * and always returned as NNNNN-NN.
 */

const CANONICAL_REGISTRY_NUMBER = /^(\d{5})\s*[-/]\s*(\d{2})$/;
const BARE_REGISTRY_NUMBER = /^(\d{5})(\d{2})$/;

/** Separated form anywhere in a text, not glued to other digits */
const SEPARATED_REGISTRY_IN_TEXT = /(?<!\d)(\d{5})\s?[-/]\s?(\d{2})(?!\d)/;

/** Bare seven-digit run anywhere in a text */
const BARE_REGISTRY_IN_TEXT = /(?<!\d)(\d{5})(\d{2})(?!\d)/;

/** Title at the start of a discrete name field: "Dr.", "Dr", "Arts", "Doctor" */
const LEADING_TITLE = /^\s*(?:dr\.|dr\b|arts\b|doctor\b)\s*/i;

/**
 * Title marker followed by a capitalised name in running text.
 * Case-sensitive so ordinary words ("de arts verklaart") are not taken for a title.
 */
const TITLED_NAME_IN_TEXT = /(?:^|\s)(?:Dr\.[\s:]*|(?:Dr|Arts|Doctor)[\s:]+)(\p{Lu}[\p{L}'’. -]*)/u;

/** Markdown decoration the analyzer adds around text */
const MARKDOWN_NOISE = /[*_#>|`]/g;

/**
 * Normalize a registry number to NNNNN-NN.
 * Returns null when the value is not one of the accepted formats.
 * normalizeRegistryNumber(normalizeRegistryNumber(x)) === normalizeRegistryNumber(x)
 */
export function normalizeRegistryNumber(value: string | null | undefined): string | null {
  if (!value) return null;

  const trimmed = value.trim();
  const match = trimmed.match(CANONICAL_REGISTRY_NUMBER) ?? trimmed.match(BARE_REGISTRY_NUMBER);
  if (!match) return null;

  return `${match[1]}-${match[2]}`;
}

/**
 * Find the first registry number in a text.
 * Separated forms win over bare digit runs, which are more likely to be something else.
 */
export function findRegistryNumber(text: string | null | undefined): string | null {
  if (!text) return null;

  const match = text.match(SEPARATED_REGISTRY_IN_TEXT) ?? text.match(BARE_REGISTRY_IN_TEXT);
  if (!match) return null;

  return `${match[1]}-${match[2]}`;
}

/**
 * Remove leading title markers from a doctor name.
 * "Dr. Jan Peeters" -> "Jan Peeters"
 */
export function stripDoctorTitle(name: string | null | undefined): string | null {
  if (!name) return null;

  let stripped = name.trim();
  while (LEADING_TITLE.test(stripped)) {
    stripped = stripped.replace(LEADING_TITLE, '');
  }

  stripped = stripped.replace(/\s+/g, ' ').trim();
  return stripped.length > 0 ? stripped : null;
}

/**
 * Find a doctor name in free text: the remainder of the first line that
 * carries a title marker.
 */
export function findDoctorNameInText(text: string | null | undefined): string | null {
  if (!text) return null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(MARKDOWN_NOISE, ' ');
    const match = line.match(TITLED_NAME_IN_TEXT);
    if (!match) continue;

    const name = match[1].replace(/\s+/g, ' ').replace(/[.\s-]+$/, '').trim();
    if (name.length > 0) return name;
  }

  return null;
}

/**
 * Split a (title-stripped) doctor name into uppercase parts, dropping dots and commas.
 */
export function doctorNameParts(name: string | null | undefined): string[] {
  const stripped = stripDoctorTitle(name);
  if (!stripped) return [];

  return stripped
    .replace(/[.,]/g, ' ')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .map((part) => part.toUpperCase());
}

/**
 * Last name used for the fuzzy registry lookup: the final name part.
 */
export function deriveLastName(name: string | null | undefined): string | null {
  const stripped = stripDoctorTitle(name);
  if (!stripped) return null;

  const parts = stripped
    .replace(/[.,]/g, ' ')
    .split(/\s+/)
    .filter((part) => part.length > 0);

  return parts.length > 0 ? parts[parts.length - 1] : null;
}
