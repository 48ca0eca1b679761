import type { CalibrationDataPoint, CalibrationRecord } from '../domain/calibration.js';
import type { ScalingProfile } from '../domain/scaling-profile.js';

export interface KnownLoad {
  ctl: number;
  atl: number;
}

export interface CalibrationStore {
  loadProfile(): Promise<ScalingProfile | null>;
  saveProfile(profile: ScalingProfile): Promise<void>;

  insertPoints(points: CalibrationDataPoint[]): Promise<void>;
  listPoints(): Promise<CalibrationDataPoint[]>;
  replacePoint(point: CalibrationDataPoint): Promise<void>;
  deleteAllPoints(): Promise<void>;

  getKnownLoad(date: string): Promise<KnownLoad | null>;
  putKnownLoad(date: string, load: KnownLoad): Promise<void>;

  saveRecord(record: CalibrationRecord): Promise<void>;
  listRecords(): Promise<CalibrationRecord[]>;
}

// Process-local; copies on the way in and out
export class InMemoryCalibrationStore implements CalibrationStore {
  private profile: ScalingProfile | null = null;
  private points = new Map<string, CalibrationDataPoint>();
  private load = new Map<string, KnownLoad>();
  private records = new Map<string, CalibrationRecord>();

  async loadProfile() {
    return this.profile ? { ...this.profile } : null;
  }

  async saveProfile(profile: ScalingProfile) {
    this.profile = { ...profile };
  }

  async insertPoints(points: CalibrationDataPoint[]) {
    for (const p of points) this.points.set(p.id, { ...p });
  }

  async listPoints() {
    return [...this.points.values()]
      .map((p) => ({ ...p }))
      .sort((a, b) => b.effectiveDate.localeCompare(a.effectiveDate));
  }

  async replacePoint(point: CalibrationDataPoint) {
    if (!this.points.has(point.id)) throw new Error(`Calibration point not found: ${point.id}`);
    this.points.set(point.id, { ...point });
  }

  async deleteAllPoints() {
    this.points.clear();
  }

  async getKnownLoad(date: string) {
    const v = this.load.get(date);
    return v ? { ...v } : null;
  }

  async putKnownLoad(date: string, load: KnownLoad) {
    this.load.set(date, { ...load });
  }

  async saveRecord(record: CalibrationRecord) {
    this.records.set(record.id, { ...record });
  }

  async listRecords() {
    return [...this.records.values()].sort((a, b) => b.effectiveDate.localeCompare(a.effectiveDate));
  }
}
