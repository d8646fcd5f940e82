import { describe, expect, it, vi } from 'vitest';

import { createExclusionCheck, deferRecords } from '@/lib/provisioning/collaborators';
import { makeDevice } from '@/test/fixtures';

import type { AuditSink, JobRegistry } from '@/lib/provisioning/collaborators';

describe('createExclusionCheck', () => {
  const check = createExclusionCheck({ enabled: true, customFieldName: 'exclude_from_monitoring' });

  it('excludes objects with a truthy field', () => {
    expect(check.isExcluded(makeDevice({ customFields: { exclude_from_monitoring: true } }))).toBe(true);
    expect(check.isExcluded(makeDevice({ customFields: { exclude_from_monitoring: ' Yes ' } }))).toBe(true);
  });

  it('keeps objects without the field or with a falsy value', () => {
    expect(check.isExcluded(makeDevice())).toBe(false);
    expect(check.isExcluded(makeDevice({ customFields: { exclude_from_monitoring: 'false' } }))).toBe(false);
  });

  it('does nothing when disabled', () => {
    const disabled = createExclusionCheck({ enabled: false, customFieldName: 'exclude_from_monitoring' });
    expect(disabled.isExcluded(makeDevice({ customFields: { exclude_from_monitoring: true } }))).toBe(false);
  });
});

describe('deferRecords', () => {
  function sinks() {
    return {
      audit: {
        logCreationEvent: vi.fn<AuditSink['logCreationEvent']>(async () => {}),
        logUpdateEvent: vi.fn<AuditSink['logUpdateEvent']>(async () => {}),
        logDeletionEvent: vi.fn<AuditSink['logDeletionEvent']>(async () => {}),
      },
      jobs: { associateModelWithJob: vi.fn<JobRegistry['associateModelWithJob']>(async () => {}) },
    };
  }

  it('writes held records once the work has finished', async () => {
    const real = sinks();

    const result = await deferRecords(real, async ({ audit, jobs }) => {
      await audit.logCreationEvent({ model: 'host_config', objectId: 3, objectName: 'z-device-100' });
      await jobs.associateModelWithJob({ jobId: 'job-1', model: 'host_config', objectId: 3 });
      expect(real.audit.logCreationEvent).not.toHaveBeenCalled();
      return 'done';
    });

    expect(result).toBe('done');
    expect(real.audit.logCreationEvent).toHaveBeenCalledWith({ model: 'host_config', objectId: 3, objectName: 'z-device-100' });
    expect(real.jobs.associateModelWithJob).toHaveBeenCalledWith({ jobId: 'job-1', model: 'host_config', objectId: 3 });
  });

  it('drops held records when the work fails', async () => {
    const real = sinks();

    await expect(
      deferRecords(real, async ({ audit }) => {
        await audit.logDeletionEvent({ model: 'mapping_rule', objectId: 2, objectName: 'Prod-Web' });
        throw new Error('rolled back');
      }),
    ).rejects.toThrow('rolled back');

    expect(real.audit.logDeletionEvent).not.toHaveBeenCalled();
  });
});
