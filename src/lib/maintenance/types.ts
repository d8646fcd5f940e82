export type MaintenanceTarget =
  | { kind: 'host_config'; id: number }
  | { kind: 'site'; id: number }
  | { kind: 'cluster'; id: number }
  | { kind: 'host_group'; id: string }
  | { kind: 'proxy'; id: string }
  | { kind: 'proxy_group'; id: string };

export type MaintenanceStatus = 'pending' | 'active' | 'expired' | 'failed';

export type MaintenanceWindow = {
  id: number;
  name: string;
  /** Inclusive. */
  startTime: Date;
  /** Exclusive. */
  endTime: Date;
  targets: MaintenanceTarget[];
  disableDataCollection: boolean;
  remoteId: string | null;
  status: MaintenanceStatus;
  description: string | null;
};

export type MaintenanceWindowDraft = Omit<MaintenanceWindow, 'id' | 'remoteId' | 'status'>;
