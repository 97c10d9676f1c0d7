import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Technician } from '../../domain/entities/Technician.js';
import { JsonFileStore } from '../JsonFileStore.js';
import { logger } from '../logger.js';

const technicianRecordSchema = z.object({
  name: z.string().min(1),
  commission_rate: z.number().finite(),
  created_at: z.string().datetime(),
});

type TechnicianRecord = z.infer<typeof technicianRecordSchema>;

export class TechnicianRepository {
  private readonly store: JsonFileStore<TechnicianRecord>;

  constructor(filePath: string) {
    this.store = new JsonFileStore(filePath, technicianRecordSchema);
  }

  async list(): Promise<Technician[]> {
    const records = await this.store.read();
    return Object.entries(records)
      .map(([id, record]) => this.fromRecord(id, record))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async getById(id: string): Promise<Technician | null> {
    const records = await this.store.read();
    const record = records[id];
    return record ? this.fromRecord(id, record) : null;
  }

  /**
   * Case-insensitive exact name match
   */
  async findByName(name: string): Promise<Technician | null> {
    const wanted = name.trim().toLowerCase();
    const technicians = await this.list();
    return technicians.find((technician) => technician.name.toLowerCase() === wanted) ?? null;
  }

  async save(
    technician: Omit<Technician, 'id' | 'createdAt'> & Partial<Pick<Technician, 'id' | 'createdAt'>>
  ): Promise<Technician> {
    const id = technician.id ?? randomUUID();
    const saved = await this.store.update((records) => {
      const record: TechnicianRecord = {
        name: technician.name,
        commission_rate: technician.commissionRate,
        created_at:
          records[id]?.created_at ?? (technician.createdAt ?? new Date()).toISOString(),
      };
      records[id] = record;
      return this.fromRecord(id, record);
    });

    logger.debug('Technician saved', { technicianId: id });
    return saved;
  }

  async delete(id: string): Promise<boolean> {
    return this.store.update((records) => {
      if (!(id in records)) return false;
      delete records[id];
      return true;
    });
  }

  private fromRecord(id: string, record: TechnicianRecord): Technician {
    return {
      id,
      name: record.name,
      commissionRate: record.commission_rate,
      createdAt: new Date(record.created_at),
    };
  }
}
