/**
 * Database Access
 *
 * Postgres-backed doctor registry lookups and fraud case inserts.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type DoctorRegistry,
  type FraudCase,
  type FraudCaseStore,
  type LocationHint,
  type RegistryDoctor,
} from '@attestation/shared';

const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: config.dbCallTimeoutMs,
  statement_timeout: config.dbCallTimeoutMs,
});

export type RegistryRow = {
  registry_number: string;
  first_name: string | null;
  last_name: string;
  address: string | null;
  postal_code: string | null;
  city: string | null;
};

/** The query surface the registry needs; a pg Pool satisfies it. */
export interface RegistryQueryable {
  query(text: string, values: unknown[]): Promise<{ rows: RegistryRow[] }>;
}

const REGISTRY_COLUMNS = 'registry_number, first_name, last_name, address, postal_code, city';

/** Cap on last-name candidates, applied after location ordering */
const MAX_NAME_CANDIDATES = 50;

function toRegistryDoctor(row: RegistryRow): RegistryDoctor {
  return {
    registry_number: row.registry_number,
    first_name: row.first_name,
    last_name: row.last_name,
    address: row.address,
    postal_code: row.postal_code,
    city: row.city,
  };
}

/** Escape LIKE wildcards so a name is matched literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class PgDoctorRegistry implements DoctorRegistry {
  constructor(private readonly db: RegistryQueryable = pool) {}

  async findByRegistryNumber(registryNumber: string): Promise<RegistryDoctor | null> {
    const startTime = Date.now();

    try {
      const result = await this.db.query(
        `SELECT ${REGISTRY_COLUMNS}
         FROM doctors_registry
         WHERE registry_number = $1
         LIMIT 1`,
        [registryNumber]
      );
      return result.rows.length > 0 ? toRegistryDoctor(result.rows[0]) : null;
    } finally {
      dbQueryDurationHistogram.observe(
        { operation: 'find_doctor_by_registry_number' },
        (Date.now() - startTime) / 1000
      );
    }
  }

  async findByLastName(
    lastName: string,
    location: LocationHint = { postal_code: null, city: null }
  ): Promise<RegistryDoctor[]> {
    const startTime = Date.now();
    const city = location.city?.trim() || null;

    try {
      // Rows sharing the postal code, or whose city or address overlaps the
      // hinted city, sort first so the cap cannot push them out.
      const result = await this.db.query(
        `SELECT ${REGISTRY_COLUMNS}
         FROM doctors_registry
         WHERE last_name ILIKE $1
         ORDER BY
           CASE
             WHEN postal_code = $2
               OR city ILIKE $3
               OR address ILIKE $3
               OR (city <> '' AND $4 ILIKE '%' || city || '%')
             THEN 0
             ELSE 1
           END,
           last_name, first_name
         LIMIT $5`,
        [
          `%${escapeLikePattern(lastName.trim())}%`,
          location.postal_code,
          city ? `%${escapeLikePattern(city)}%` : null,
          city,
          MAX_NAME_CANDIDATES,
        ]
      );
      logger.debug('Registry last-name lookup', { candidate_count: result.rows.length });
      return result.rows.map(toRegistryDoctor);
    } finally {
      dbQueryDurationHistogram.observe({ operation: 'find_doctor_by_last_name' }, (Date.now() - startTime) / 1000);
    }
  }
}

export class PgFraudCaseStore implements FraudCaseStore {
  constructor(private readonly db: Pool = pool) {}

  async insertCase(fraudCase: FraudCase): Promise<string> {
    const startTime = Date.now();

    try {
      const result = await this.db.query<{ case_id: string }>(
        `INSERT INTO fraud_cases (
           case_id, created_at, patient_name, doctor_name, reason, priority, status,
           claimed_registry_number, claimed_start_date, claimed_end_date, patient_national_id,
           registry_match_status, match_tier, submission_channel, source_filename
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
         RETURNING case_id`,
        [
          fraudCase.case_id,
          fraudCase.created_at,
          fraudCase.patient_name,
          fraudCase.doctor_name,
          fraudCase.reason,
          fraudCase.priority,
          fraudCase.status,
          fraudCase.claimed_registry_number,
          fraudCase.claimed_start_date,
          fraudCase.claimed_end_date,
          fraudCase.patient_national_id,
          fraudCase.registry_match_status,
          fraudCase.match_tier,
          fraudCase.submission_channel,
          fraudCase.source_filename,
        ]
      );
      return result.rows[0]?.case_id ?? fraudCase.case_id;
    } finally {
      dbQueryDurationHistogram.observe({ operation: 'insert_fraud_case' }, (Date.now() - startTime) / 1000);
    }
  }
}

/** Round-trip used by the health endpoint. */
export async function checkDatabase(db: Pool = pool): Promise<void> {
  await db.query('SELECT 1');
}

export { pool };
