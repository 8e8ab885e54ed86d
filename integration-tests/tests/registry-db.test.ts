/**
 * Postgres doctor registry query tests against a recording query runner
 */

import { matchDoctor, type RegistryDoctor } from '@attestation/shared';
import {
  PgDoctorRegistry,
  escapeLikePattern,
  type RegistryQueryable,
  type RegistryRow,
} from '../../services/attestation-api/src/lib/db';
import { OTHER_PEETERS, REGISTERED_DOCTOR } from './helpers';

class RecordingQueryRunner implements RegistryQueryable {
  readonly calls: { text: string; values: unknown[] }[] = [];

  constructor(private readonly rows: RegistryRow[] = []) {}

  async query(text: string, values: unknown[]): Promise<{ rows: RegistryRow[] }> {
    this.calls.push({ text, values });
    return { rows: this.rows };
  }
}

function row(doctor: RegistryDoctor): RegistryRow {
  return { ...doctor };
}

describe('PgDoctorRegistry', () => {
  it('should look a registry number up by equality', async () => {
    const db = new RecordingQueryRunner([row(REGISTERED_DOCTOR)]);

    const found = await new PgDoctorRegistry(db).findByRegistryNumber('12345-67');

    expect(found).toEqual(REGISTERED_DOCTOR);
    expect(db.calls[0].text).toMatch(/WHERE registry_number = \$1\s+LIMIT 1/);
    expect(db.calls[0].values).toEqual(['12345-67']);
  });

  it('should return null for an unknown registry number', async () => {
    const found = await new PgDoctorRegistry(new RecordingQueryRunner()).findByRegistryNumber('99999-99');

    expect(found).toBeNull();
  });

  it('should rank location overlaps before capping last-name candidates', async () => {
    const db = new RecordingQueryRunner([row(REGISTERED_DOCTOR)]);

    await new PgDoctorRegistry(db).findByLastName('Peeters', { postal_code: '9000', city: 'Gent' });

    const [{ text, values }] = db.calls;
    expect(text).toMatch(
      /WHERE last_name ILIKE \$1\s+ORDER BY\s+CASE\s+WHEN postal_code = \$2\s+OR city ILIKE \$3\s+OR address ILIKE \$3/
    );
    expect(text).toMatch(/END,\s+last_name, first_name\s+LIMIT \$5$/);
    expect(values).toEqual(['%Peeters%', '9000', '%Gent%', 'Gent', 50]);
  });

  it('should pass null location parameters without a hint', async () => {
    const db = new RecordingQueryRunner();

    await new PgDoctorRegistry(db).findByLastName(' Peeters ');

    expect(db.calls[0].values).toEqual(['%Peeters%', null, null, null, 50]);
  });

  it('should match name and city literally', async () => {
    const db = new RecordingQueryRunner();

    await new PgDoctorRegistry(db).findByLastName('O_Brien%', { postal_code: null, city: '100%_Stad' });

    expect(db.calls[0].values).toEqual(['%O\\_Brien\\%%', null, '%100\\%\\_Stad%', '100%_Stad', 50]);
  });

  it('should hand the document location to the query during fuzzy matching', async () => {
    const db = new RecordingQueryRunner([row(OTHER_PEETERS), row(REGISTERED_DOCTOR)]);

    const verdict = await matchDoctor(
      { full_name: 'Jan Peeters', registry_number: null, address: null, postal_city: '9000 Gent', phone: null },
      new PgDoctorRegistry(db)
    );

    expect(db.calls[0].values).toEqual(['%Peeters%', '9000', '%Gent%', 'Gent', 50]);
    expect(verdict.match_tier).toBe('FUZZY');
    expect(verdict.matched_record).toEqual(REGISTERED_DOCTOR);
  });
});

describe('escapeLikePattern', () => {
  it('should escape wildcards and backslashes', () => {
    expect(escapeLikePattern('a_b%c\\d')).toBe('a\\_b\\%c\\\\d');
  });
});
