import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { CONFIG } from '../config.js';
import type { CalibrationDataPoint, CalibrationRecord } from '../domain/calibration.js';
import type { ScalingProfile } from '../domain/scaling-profile.js';
import {
  CalibrationPointRowSchema,
  CalibrationRecordRowSchema,
  DailyLoadRowSchema,
  ScalingProfileRowSchema,
  parseOrThrow,
  type CalibrationPointRow,
  type CalibrationRecordRow,
  type ScalingProfileRow
} from '../domain/schemas.js';
import { deltasOf } from '../domain/calibration.js';
import type { CalibrationStore, KnownLoad } from './calibration-store.js';

export function createSupabaseClient(): SupabaseClient {
  return createClient(CONFIG.supabaseUrl(), CONFIG.supabaseServiceKey(), {
    auth: { persistSession: false }
  });
}

const undef = <T>(v: T | null): T | undefined => (v === null ? undefined : v);

export function profileToRow(athleteId: string, p: ScalingProfile): ScalingProfileRow {
  return {
    athlete_id: athleteId,
    version: p.version,
    global_factor: p.globalFactor,
    global_confidence: p.globalConfidence,
    global_sample_count: p.globalSampleCount,
    per_sport: p.perSport,
    per_intensity_band: p.perIntensityBand,
    learning_enabled: p.learningEnabled,
    min_samples: p.minSamplesForConfidence,
    min_confidence: p.minConfidence,
    factor_min: p.factorBounds.min,
    factor_max: p.factorBounds.max,
    updated_at: p.updatedAt.toISOString()
  };
}

export function profileFromRow(raw: unknown): ScalingProfile {
  const row = parseOrThrow(ScalingProfileRowSchema, raw, 'scaling_profiles row');
  return {
    version: row.version,
    globalFactor: row.global_factor,
    globalConfidence: row.global_confidence,
    globalSampleCount: row.global_sample_count,
    perSport: row.per_sport,
    perIntensityBand: row.per_intensity_band,
    learningEnabled: row.learning_enabled,
    minSamplesForConfidence: row.min_samples,
    minConfidence: row.min_confidence,
    factorBounds: { min: row.factor_min, max: row.factor_max },
    updatedAt: new Date(row.updated_at)
  };
}

export function pointToRow(athleteId: string, p: CalibrationDataPoint): CalibrationPointRow {
  return {
    id: p.id,
    athlete_id: athleteId,
    effective_date: p.effectiveDate,
    created_at: p.createdAt.toISOString(),
    extracted_value: p.extractedValue,
    calculated_value: p.calculatedValue,
    source_confidence: p.sourceConfidence,
    activity_category: p.activityCategory ?? null,
    is_multi_sport: p.isMultiSport,
    intensity_factor: p.intensityFactor ?? null,
    intensity_band: p.intensityBand ?? null,
    derivation_method: p.derivationMethod,
    is_valid: p.isValid,
    invalid_reason: p.invalidReason ?? null,
    calibration_record_id: p.calibrationRecordId ?? null
  };
}

export function pointFromRow(raw: unknown): CalibrationDataPoint {
  const row = parseOrThrow(CalibrationPointRowSchema, raw, 'calibration_points row');
  return {
    id: row.id,
    effectiveDate: row.effective_date,
    createdAt: new Date(row.created_at),
    extractedValue: row.extracted_value,
    calculatedValue: row.calculated_value,
    sourceConfidence: row.source_confidence,
    activityCategory: undef(row.activity_category),
    isMultiSport: row.is_multi_sport,
    intensityFactor: undef(row.intensity_factor),
    intensityBand: undef(row.intensity_band),
    derivationMethod: row.derivation_method,
    isValid: row.is_valid,
    invalidReason: undef(row.invalid_reason),
    calibrationRecordId: undef(row.calibration_record_id)
  };
}

export function recordToRow(athleteId: string, r: CalibrationRecord): CalibrationRecordRow {
  return {
    id: r.id,
    athlete_id: athleteId,
    effective_date: r.effectiveDate,
    extracted_ctl: r.extracted.ctl ?? null,
    extracted_atl: r.extracted.atl ?? null,
    extracted_tsb: r.extracted.tsb ?? null,
    calculated_ctl: r.calculated.ctl,
    calculated_atl: r.calculated.atl,
    calculated_tsb: r.calculated.tsb,
    source_confidence: r.sourceConfidence,
    source: r.source,
    applied: r.applied,
    note: r.note ?? null
  };
}

export function recordFromRow(raw: unknown): CalibrationRecord {
  const row = parseOrThrow(CalibrationRecordRowSchema, raw, 'calibration_records row');
  const extracted = { ctl: undef(row.extracted_ctl), atl: undef(row.extracted_atl), tsb: undef(row.extracted_tsb) };
  const calculated = { ctl: row.calculated_ctl, atl: row.calculated_atl, tsb: row.calculated_tsb };
  return {
    id: row.id,
    effectiveDate: row.effective_date,
    extracted,
    calculated,
    deltas: deltasOf(extracted, calculated),
    sourceConfidence: row.source_confidence,
    source: row.source,
    applied: row.applied,
    note: undef(row.note)
  };
}

// PostgREST caps a response at 1000 rows by default
export const POINTS_PAGE_SIZE = 1000;

export class SupabaseCalibrationStore implements CalibrationStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly athleteId: string,
    private readonly pageSize = POINTS_PAGE_SIZE
  ) {}

  async loadProfile(): Promise<ScalingProfile | null> {
    const { data, error } = await this.supabase
      .from('scaling_profiles')
      .select('*')
      .eq('athlete_id', this.athleteId)
      .limit(1)
      .maybeSingle();

    if (error) throw error;
    return data ? profileFromRow(data) : null;
  }

  async saveProfile(profile: ScalingProfile) {
    const { error } = await this.supabase
      .from('scaling_profiles')
      .upsert(profileToRow(this.athleteId, profile), { onConflict: 'athlete_id' });
    if (error) throw error;
  }

  async insertPoints(points: CalibrationDataPoint[]) {
    if (!points.length) return;
    const { error } = await this.supabase.from('calibration_points').insert(points.map((p) => pointToRow(this.athleteId, p)));
    if (error) throw error;
  }

  // Pages until a short page comes back
  async listPoints(): Promise<CalibrationDataPoint[]> {
    const res: CalibrationDataPoint[] = [];
    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await this.supabase
        .from('calibration_points')
        .select('*')
        .eq('athlete_id', this.athleteId)
        .order('effective_date', { ascending: false })
        .order('id', { ascending: true })
        .range(from, from + this.pageSize - 1);

      if (error) throw error;
      const page = data || [];
      res.push(...page.map(pointFromRow));
      if (page.length < this.pageSize) return res;
    }
  }

  async replacePoint(point: CalibrationDataPoint) {
    const { error } = await this.supabase
      .from('calibration_points')
      .update(pointToRow(this.athleteId, point))
      .eq('id', point.id)
      .eq('athlete_id', this.athleteId);
    if (error) throw error;
  }

  async deleteAllPoints() {
    const { error } = await this.supabase.from('calibration_points').delete().eq('athlete_id', this.athleteId);
    if (error) throw error;
  }

  async getKnownLoad(date: string): Promise<KnownLoad | null> {
    const { data, error } = await this.supabase
      .from('daily_load')
      .select('*')
      .eq('athlete_id', this.athleteId)
      .eq('date', date)
      .limit(1)
      .maybeSingle();

    if (error) throw error;
    if (!data) return null;
    const row = parseOrThrow(DailyLoadRowSchema, data, 'daily_load row');
    return { ctl: row.ctl, atl: row.atl };
  }

  async putKnownLoad(date: string, load: KnownLoad) {
    const { error } = await this.supabase
      .from('daily_load')
      .upsert({ athlete_id: this.athleteId, date, ctl: load.ctl, atl: load.atl }, { onConflict: 'athlete_id,date' });
    if (error) throw error;
  }

  async saveRecord(record: CalibrationRecord) {
    const { error } = await this.supabase
      .from('calibration_records')
      .upsert(recordToRow(this.athleteId, record), { onConflict: 'id' });
    if (error) throw error;
  }

  async listRecords(): Promise<CalibrationRecord[]> {
    const { data, error } = await this.supabase
      .from('calibration_records')
      .select('*')
      .eq('athlete_id', this.athleteId)
      .order('effective_date', { ascending: false });

    if (error) throw error;
    return (data || []).map(recordFromRow);
  }
}
