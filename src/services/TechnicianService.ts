import { randomUUID } from 'node:crypto';
import { createTechnician, type Technician } from '../domain/entities/Technician.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import type { TechnicianRepository } from '../infra/repositories/TechnicianRepository.js';
import { logger } from '../infra/logger.js';

/**
 * TechnicianService - technician CRUD; names are unique case-insensitively
 */
export class TechnicianService {
  constructor(
    private technicianRepo: TechnicianRepository,
    private defaultCommissionRate: number
  ) {}

  listTechnicians(): Promise<Technician[]> {
    return this.technicianRepo.list();
  }

  async getTechnician(id: string): Promise<Technician> {
    const technician = await this.technicianRepo.getById(id);
    if (!technician) {
      throw new NotFoundError('Technician', id);
    }
    return technician;
  }

  async createTechnician(params: { name: string; commissionRate?: number }): Promise<Technician> {
    const name = params.name.trim();
    if (!name) {
      throw new ValidationError('Technician name is required');
    }
    if (await this.technicianRepo.findByName(name)) {
      throw new ValidationError(`Technician "${name}" already exists`, { name }, 'DUPLICATE_TECHNICIAN');
    }

    const saved = await this.technicianRepo.save(
      createTechnician({
        id: randomUUID(),
        name,
        commissionRate: params.commissionRate ?? this.defaultCommissionRate,
      })
    );
    logger.info('Technician created', { technicianId: saved.id });
    return saved;
  }

  async updateTechnician(
    id: string,
    params: { name: string; commissionRate: number }
  ): Promise<Technician> {
    const existing = await this.getTechnician(id);
    const name = params.name.trim();
    if (!name) {
      throw new ValidationError('Technician name is required');
    }
    const clash = await this.technicianRepo.findByName(name);
    if (clash && clash.id !== id) {
      throw new ValidationError(`Technician "${name}" already exists`, { name }, 'DUPLICATE_TECHNICIAN');
    }

    return this.technicianRepo.save({ ...existing, name, commissionRate: params.commissionRate });
  }

  async deleteTechnician(id: string): Promise<void> {
    const removed = await this.technicianRepo.delete(id);
    if (!removed) {
      throw new NotFoundError('Technician', id);
    }
    logger.info('Technician deleted', { technicianId: id });
  }

  async getOrCreateByName(name: string, commissionRate?: number): Promise<Technician> {
    const existing = await this.technicianRepo.findByName(name);
    if (existing) return existing;
    return this.createTechnician({ name, commissionRate });
  }
}
