import { errorMessage, toPublicError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { refreshSyncStatus, syncHost } from '@/lib/provisioning/orchestrator';

import type { HostConfig } from '@/lib/host-config/types';
import type { EngineDeps } from '@/lib/provisioning/orchestrator';

export type SweepSummary = {
  total: number;
  updated: number;
  failed: number;
  cancelled: boolean;
};

type SweepOptions = {
  /** Checked between records. */
  isCancelled?: () => boolean;
};

async function sweep(args: {
  name: string;
  hostConfigs: HostConfig[];
  options: SweepOptions;
  run: (hostConfig: HostConfig) => Promise<void>;
}): Promise<SweepSummary> {
  const summary: SweepSummary = { total: args.hostConfigs.length, updated: 0, failed: 0, cancelled: false };

  for (const hostConfig of args.hostConfigs) {
    if (args.options.isCancelled?.()) {
      summary.cancelled = true;
      break;
    }
    try {
      await args.run(hostConfig);
      summary.updated += 1;
    } catch (err) {
      summary.failed += 1;
      logEvent({
        level: 'warn',
        service: 'engine',
        event_type: `${args.name}.host_failed`,
        host_config_id: hostConfig.id,
        message: errorMessage(err),
        error: toPublicError(err),
      });
    }
  }

  logEvent({ level: summary.failed > 0 ? 'warn' : 'info', service: 'engine', event_type: `${args.name}.finished`, ...summary });
  return summary;
}

/** Push every remotely created configuration, one at a time; one failure does not stop the rest. */
export async function syncAllHosts(deps: EngineDeps, options: SweepOptions = {}): Promise<SweepSummary> {
  const hostConfigs = (await deps.store.listHostConfigs()).filter((h) => h.remoteHostId !== null);
  return sweep({
    name: 'sweep.sync',
    hostConfigs,
    options,
    run: async (hostConfig) => {
      await syncHost(deps, { hostConfigId: hostConfig.id });
    },
  });
}

/** Compare-only pass over configurations never checked, or last checked before `cutoff`. */
export async function refreshSyncStatuses(
  deps: EngineDeps,
  input: { cutoff: Date } & SweepOptions,
): Promise<SweepSummary> {
  const cutoff = input.cutoff.getTime();
  const hostConfigs = (await deps.store.listHostConfigs()).filter(
    (h) => h.remoteHostId !== null && (h.lastSyncUpdate === null || h.lastSyncUpdate.getTime() < cutoff),
  );
  return sweep({
    name: 'sweep.refresh',
    hostConfigs,
    options: input,
    run: async (hostConfig) => {
      await refreshSyncStatus(deps, { hostConfigId: hostConfig.id });
    },
  });
}
