/**
 * Technician entity. Stored jobs reference it by id; deleting a technician
 * leaves those references dangling so historical reports stay as they were.
 */
export interface Technician {
  id: string;
  name: string;
  /** Default commission rate for new jobs */
  commissionRate: number;
  createdAt: Date;
}

export function createTechnician(params: {
  id: string;
  name: string;
  commissionRate: number;
  createdAt?: Date;
}): Technician {
  return {
    id: params.id,
    name: params.name.trim(),
    commissionRate: params.commissionRate,
    createdAt: params.createdAt ?? new Date(),
  };
}
