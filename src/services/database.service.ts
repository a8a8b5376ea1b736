import { query } from '../config/database';
import { IntakeRecord } from '../types/session';
import { logger } from '../utils/logger';

export interface RepairOrderStore {
  /** Inserts a completed repair order and returns its sequential id. */
  insertRecord(record: IntakeRecord, authorId: string): Promise<number>;
}

export class RepairOrderRepository implements RepairOrderStore {
  async insertRecord(record: IntakeRecord, authorId: string): Promise<number> {
    const result = await query(
      `INSERT INTO repair_orders (phone, make_model, plate, odometer, issue, author_id)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING id`,
      [record.phone, record.makeModel, record.plate, record.odometer, record.issue, authorId]
    );

    const id = Number(result.rows[0]?.id);
    if (!Number.isInteger(id)) {
      throw new Error('Repair order insert returned no id');
    }

    logger.info('Repair order stored', { id, authorId });
    return id;
  }
}
