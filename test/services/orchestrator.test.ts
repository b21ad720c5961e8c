import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ValidationOrchestrator, deriveStatus, type BatchOptions } from '../../src/services/orchestrator/index.js';
import type { Flag } from '../../src/domain/types.js';
import {
  addressResult,
  createSourceFakes,
  failed,
  phoneResult,
  providerRecord,
  registryResult,
  webResult,
} from '../helpers/fixtures.js';

const now = new Date('2024-03-01T12:00:00Z');

function infoFlag(): Flag {
  return {
    id: 'flag-1',
    providerId: 'PRV-1',
    flagType: 'INFO',
    severity: 'low',
    field: 'website',
    message: 'No website found for provider',
    details: {},
    resolved: false,
    resolvedAt: null,
    createdAt: now,
  };
}

describe('deriveStatus', () => {
  it('validates at 80 or above only without flags', () => {
    expect(deriveStatus(80, [])).toBe('VALIDATED');
    expect(deriveStatus(95, [infoFlag()])).toBe('PARTIAL');
  });

  it('is PARTIAL from 60', () => {
    expect(deriveStatus(60, [])).toBe('PARTIAL');
    expect(deriveStatus(79.99, [])).toBe('PARTIAL');
  });

  it('is FLAGGED below 60', () => {
    expect(deriveStatus(59.99, [])).toBe('FLAGGED');
  });
});

describe('ValidationOrchestrator.validate', () => {
  let fakes: ReturnType<typeof createSourceFakes>;
  let orchestrator: ValidationOrchestrator;

  beforeEach(() => {
    fakes = createSourceFakes();
    orchestrator = new ValidationOrchestrator({ sources: fakes.sources, now: () => now });
  });

  it('fuses four agreeing sources into a VALIDATED result', async () => {
    const result = await orchestrator.validate(providerRecord(), { jobId: 'job-1' });

    expect(result).toMatchObject({
      providerId: 'PRV-1',
      jobId: 'job-1',
      timestamp: now,
      durationSeconds: 0,
      overallConfidence: 93,
      status: 'VALIDATED',
      flags: [],
      anomalies: [],
      recommendations: [
        'Provider successfully validated across all sources',
        'High confidence score - no manual review needed',
      ],
      sourcesUsed: ['NPI Registry (CMS)', 'TomTom Geocoding API', 'NumVerify API', 'Web Scraping'],
      error: null,
    });
  });

  it('passes the parsed record and signal to every source', async () => {
    const controller = new AbortController();

    await orchestrator.validate({ providerId: 'PRV-9', firstName: 'Jane', lastName: 'Doe' }, { signal: controller.signal });

    const [record, signal] = fakes.checks.registry.mock.calls[0] ?? [];
    expect(record?.fullName).toBe('Jane Doe');
    expect(record?.npi).toBe('');
    expect(signal).toBe(controller.signal);
    expect(fakes.checks.web).toHaveBeenCalledTimes(1);
  });

  it('flags and downgrades a registry failure', async () => {
    fakes.checks.registry.mockResolvedValue({
      ...failed(registryResult(), 0, 'NPI not found in registry'),
      matchesInput: false,
    });

    const result = await orchestrator.validate(providerRecord());

    expect(result.overallConfidence).toBe(28);
    expect(result.status).toBe('FLAGGED');
    expect(result.flags.map((f) => f.message)).toEqual(['NPI not found in registry or invalid']);
    expect(result.flags[0]?.createdAt).toBe(now);
    expect(result.recommendations[0]).toBe('CRITICAL: NPI not found in registry - verify NPI number');
  });

  it('returns ERROR for a record that fails validation without calling sources', async () => {
    const result = await orchestrator.validate({ providerId: '' });

    expect(result.status).toBe('ERROR');
    expect(result.overallConfidence).toBe(0);
    expect(result.error).toBe('Invalid provider record: providerId: Provider id is required');
    expect(result.validations).toEqual({ registry: null, address: null, phone: null, web: null });
    expect(fakes.checks.registry).not.toHaveBeenCalled();
  });

  it('returns ERROR when a source throws, keeping the other outcomes', async () => {
    fakes.checks.phone.mockRejectedValue(new Error('socket hang up'));

    const result = await orchestrator.validate(providerRecord());

    expect(result.status).toBe('ERROR');
    expect(result.error).toBe('socket hang up');
    expect(result.validations.phone).toBeNull();
    expect(result.validations.registry?.valid).toBe(true);
    expect(result.sourcesUsed).toEqual(['NPI Registry (CMS)', 'TomTom Geocoding API', 'Web Scraping']);
    expect(result.flags).toEqual([]);
  });

  it('returns ERROR when a source throws before returning a promise', async () => {
    fakes.checks.phone.mockImplementation(() => {
      throw new Error('boom');
    });

    const result = await orchestrator.validate(providerRecord());

    expect(result.status).toBe('ERROR');
    expect(result.error).toBe('boom');
    expect(result.validations.phone).toBeNull();
    expect(fakes.checks.web).toHaveBeenCalledTimes(1);
  });

  it('returns a cancelled result without flags when aborted while checks are in flight', async () => {
    const controller = new AbortController();
    const cancelledCheck = <T extends { valid: boolean; error: string | null; verifiedData: unknown; confidence: number }>(base: T) =>
      new Promise<T>((resolve) => {
        controller.signal.addEventListener('abort', () => resolve(failed(base, 0, 'API request failed: Operation cancelled')));
      });
    fakes.checks.registry.mockImplementation(() => cancelledCheck(registryResult()));
    fakes.checks.address.mockImplementation(() => cancelledCheck(addressResult()));
    fakes.checks.phone.mockImplementation(() => cancelledCheck(phoneResult()));
    fakes.checks.web.mockImplementation(() => cancelledCheck(webResult()));

    const pending = orchestrator.validate(providerRecord(), { signal: controller.signal });
    await vi.waitFor(() => expect(fakes.checks.web).toHaveBeenCalledTimes(1));
    controller.abort();
    const result = await pending;

    expect(result.status).toBe('ERROR');
    expect(result.error).toBe('Validation cancelled');
    expect(result.flags).toEqual([]);
    expect(result.overallConfidence).toBe(0);
    expect(fakes.checks.registry).toHaveBeenCalledTimes(1);
  });

  it('returns a cancelled result when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await orchestrator.validate(providerRecord(), { signal: controller.signal });

    expect(result.status).toBe('ERROR');
    expect(result.error).toBe('Validation cancelled');
    expect(fakes.checks.registry).not.toHaveBeenCalled();
  });

  it('yields identical results for identical inputs', async () => {
    fakes.checks.phone.mockResolvedValue(failed(phoneResult(), 40, 'Phone number is not valid'));
    const fixed = new ValidationOrchestrator({ sources: fakes.sources, now: () => now, newId: () => 'flag-fixed' });

    const first = await fixed.validate(providerRecord());
    const second = await fixed.validate(providerRecord());

    expect(second).toEqual(first);
    expect(first.flags.map((f) => f.id)).toEqual(['flag-fixed']);
  });
});

describe('ValidationOrchestrator.validateBatch', () => {
  const records = ['PRV-1', 'PRV-2', 'PRV-3', 'PRV-4', 'PRV-5'].map((providerId) => providerRecord({ providerId }));

  it('isolates a failing record and keeps input order', async () => {
    const fakes = createSourceFakes();
    fakes.checks.phone.mockImplementation(async (record) => {
      if (record.providerId === 'PRV-3') throw new Error('socket hang up');
      return phoneResult();
    });
    const onProgress = vi.fn<NonNullable<BatchOptions['onProgress']>>();
    const orchestrator = new ValidationOrchestrator({ sources: fakes.sources, now: () => now });

    const results = await orchestrator.validateBatch(records, { concurrency: 2, onProgress });

    expect(results.map((r) => r.providerId)).toEqual(['PRV-1', 'PRV-2', 'PRV-3', 'PRV-4', 'PRV-5']);
    expect(results.map((r) => r.status)).toEqual(['VALIDATED', 'VALIDATED', 'ERROR', 'VALIDATED', 'VALIDATED']);
    expect(onProgress).toHaveBeenCalledTimes(5);
    const completed = onProgress.mock.calls.map((call) => call[1].completed).sort();
    expect(completed).toEqual([1, 2, 3, 4, 5]);
  });

  it('finishes the batch when a source throws synchronously for one record', async () => {
    const fakes = createSourceFakes();
    fakes.checks.phone.mockImplementation((record) => {
      if (record.providerId === 'PRV-3') throw new Error('boom');
      return Promise.resolve(phoneResult());
    });
    const orchestrator = new ValidationOrchestrator({ sources: fakes.sources, now: () => now });

    const results = await orchestrator.validateBatch(records, { concurrency: 2 });

    expect(results.map((r) => [r.providerId, r.status, r.error])).toEqual([
      ['PRV-1', 'VALIDATED', null],
      ['PRV-2', 'VALIDATED', null],
      ['PRV-3', 'ERROR', 'boom'],
      ['PRV-4', 'VALIDATED', null],
      ['PRV-5', 'VALIDATED', null],
    ]);
  });

  it('never runs more records at once than the concurrency limit', async () => {
    const fakes = createSourceFakes();
    let active = 0;
    let peak = 0;
    fakes.checks.registry.mockImplementation(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return registryResult();
    });
    const orchestrator = new ValidationOrchestrator({ sources: fakes.sources, now: () => now });

    await orchestrator.validateBatch(records, { concurrency: 2 });

    expect(peak).toBe(2);
  });

  it('returns cancelled results for records not started before abort', async () => {
    const fakes = createSourceFakes();
    const controller = new AbortController();
    controller.abort();
    const orchestrator = new ValidationOrchestrator({ sources: fakes.sources, now: () => now });

    const results = await orchestrator.validateBatch(records.slice(0, 3), { signal: controller.signal });

    expect(results.map((r) => [r.providerId, r.status, r.error])).toEqual([
      ['PRV-1', 'ERROR', 'Validation cancelled'],
      ['PRV-2', 'ERROR', 'Validation cancelled'],
      ['PRV-3', 'ERROR', 'Validation cancelled'],
    ]);
    expect(fakes.checks.registry).not.toHaveBeenCalled();
  });

  it('keeps going when the progress callback throws', async () => {
    const fakes = createSourceFakes();
    const orchestrator = new ValidationOrchestrator({ sources: fakes.sources, now: () => now });

    const results = await orchestrator.validateBatch(records.slice(0, 2), {
      onProgress: () => {
        throw new Error('listener failed');
      },
    });

    expect(results.map((r) => r.status)).toEqual(['VALIDATED', 'VALIDATED']);
  });

  it('returns an empty list for an empty batch', async () => {
    const orchestrator = new ValidationOrchestrator({ sources: createSourceFakes().sources, now: () => now });
    expect(await orchestrator.validateBatch([])).toEqual([]);
  });
});
