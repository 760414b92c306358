import { query } from '../config/database';
import { CRMLeadData } from '../types/qualification';

export class DatabaseService {
  /** Inserts a lead; a repeat of the same phone and close time is skipped. */
  async createLead(lead: CRMLeadData): Promise<number | null> {
    const result = await query<{ id: number }>(
      `INSERT INTO leads
         (phone, name, status, source, priority, tags, custom_fields, notes, qualification_score, qualified_at, started_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (phone, qualified_at) DO NOTHING
       RETURNING id`,
      [
        lead.phone,
        lead.name,
        lead.status,
        lead.source,
        lead.priority,
        lead.tags,
        JSON.stringify(lead.custom_fields),
        lead.notes,
        lead.qualification_score,
        lead.qualified_at,
        lead.started_at,
      ]
    );

    const row = result.rows[0];
    return row ? row.id : null;
  }
}
