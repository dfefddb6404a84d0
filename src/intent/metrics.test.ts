import { describe, it, expect } from 'vitest';
import { classificationReport } from './metrics.js';
import type { IntentLabel } from '../types/intent.js';

describe('classificationReport', () => {
  const actual: IntentLabel[] = ['CHECK_RATE', 'CHECK_RATE', 'BOOK_PICKUP', 'TRACK_ORDER'];
  const predicted: IntentLabel[] = ['CHECK_RATE', 'BOOK_PICKUP', 'BOOK_PICKUP', 'BOOK_PICKUP'];

  it('computes accuracy', () => {
    expect(classificationReport(actual, predicted).accuracy).toBe(0.5);
  });

  it('computes per-class precision, recall and F1', () => {
    const { perClass } = classificationReport(actual, predicted);
    expect(perClass.CHECK_RATE?.precision).toBe(1);
    expect(perClass.CHECK_RATE?.recall).toBe(0.5);
    expect(perClass.CHECK_RATE?.f1).toBeCloseTo(2 / 3, 10);
    expect(perClass.CHECK_RATE?.support).toBe(2);

    expect(perClass.BOOK_PICKUP?.precision).toBeCloseTo(1 / 3, 10);
    expect(perClass.BOOK_PICKUP?.recall).toBe(1);
    expect(perClass.BOOK_PICKUP?.f1).toBeCloseTo(0.5, 10);
  });

  it('reports zero for a class that is never predicted', () => {
    const { perClass } = classificationReport(actual, predicted);
    expect(perClass.TRACK_ORDER).toEqual({ precision: 0, recall: 0, f1: 0, support: 1 });
  });

  it('omits labels absent from both sides', () => {
    const { perClass } = classificationReport(actual, predicted);
    expect(Object.keys(perClass)).toEqual(['CHECK_RATE', 'BOOK_PICKUP', 'TRACK_ORDER']);
  });

  it('computes macro and weighted averages', () => {
    const report = classificationReport(actual, predicted);
    expect(report.macroAvg.precision).toBeCloseTo(4 / 9, 10);
    expect(report.macroAvg.recall).toBeCloseTo(0.5, 10);
    expect(report.macroAvg.f1).toBeCloseTo(7 / 18, 10);
    expect(report.weightedAvg.precision).toBeCloseTo(7 / 12, 10);
    expect(report.weightedAvg.recall).toBeCloseTo(0.5, 10);
    expect(report.weightedAvg.f1).toBeCloseTo(11 / 24, 10);
  });

  it('rejects mismatched lengths', () => {
    expect(() => classificationReport(['CHECK_RATE'], [])).toThrow(/mismatch/);
  });
});
