export const LOGGED_ENTITIES = ['Project', 'ProjectBalance', 'ProjectPO', 'Invoice', 'InvoicePayment'] as const;
export type LoggedEntity = (typeof LOGGED_ENTITIES)[number];

export const LOGGED_ACTIONS = ['Create', 'Update', 'Delete', 'Status Update'] as const;
export type LoggedAction = (typeof LOGGED_ACTIONS)[number];

/**
 * Audit row written for every mutation (`logs` table).
 */
export interface ActivityLog {
  id: string;
  entity: LoggedEntity;
  action: LoggedAction;
  entity_id: string;
  performed_by: string;
  timestamp: Date;
}

export type NewActivityLog = Omit<ActivityLog, 'id' | 'timestamp'>;

/**
 * Query filters for the activity log. `start_date` and `end_date` are inclusive calendar days.
 */
export interface ActivityLogFilters {
  entity?: LoggedEntity;
  action?: LoggedAction;
  entity_id?: string;
  performed_by?: string;
  start_date?: string;
  end_date?: string;
}
