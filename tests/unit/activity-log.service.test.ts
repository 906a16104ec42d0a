import { ActivityLog } from '../../src/models/system/activity-log.model';
import { ActivityLogService } from '../../src/services/system/activity-log.service';
import { InMemoryDataStore } from '../helpers/in-memory-store';

const PROJECT_ID = '6f1c2c1e-8d7a-4a7e-9a55-1c2b3d4e5f60';
const INVOICE_ID = '0b9d7e52-3c41-4f6a-8e1d-2a7c9b5f4e31';

const logEntry = (overrides: Partial<ActivityLog>): ActivityLog => ({
  id: 'log-1',
  entity: 'Project',
  action: 'Create',
  entity_id: PROJECT_ID,
  performed_by: 'user-a',
  timestamp: new Date('2025-03-01T10:00:00Z'),
  ...overrides,
});

describe('ActivityLogService', () => {
  let store: InMemoryDataStore;
  let service: ActivityLogService;

  beforeEach(() => {
    store = new InMemoryDataStore();
    service = new ActivityLogService(store);
    store.tables.logs = [
      logEntry({ id: 'log-1' }),
      logEntry({
        id: 'log-2',
        entity: 'Invoice',
        entity_id: INVOICE_ID,
        performed_by: 'user-b',
        timestamp: new Date('2025-03-02T09:00:00Z'),
      }),
      logEntry({
        id: 'log-3',
        entity: 'Invoice',
        action: 'Status Update',
        entity_id: INVOICE_ID,
        timestamp: new Date('2025-03-03T23:30:00Z'),
      }),
    ];
  });

  it('should list every entry, most recent first', async () => {
    const logs = await service.list();
    expect(logs.map((log) => log.id)).toEqual(['log-3', 'log-2', 'log-1']);
  });

  it('should filter by entity, action and entity id', async () => {
    expect((await service.list({ entity: 'Invoice' })).map((log) => log.id)).toEqual(['log-3', 'log-2']);
    expect((await service.list({ action: 'Status Update' })).map((log) => log.id)).toEqual(['log-3']);
    expect((await service.list({ entity_id: PROJECT_ID })).map((log) => log.id)).toEqual(['log-1']);
  });

  it('should filter by the acting user', async () => {
    expect((await service.list({ performed_by: 'user-b' })).map((log) => log.id)).toEqual(['log-2']);
  });

  it('should treat the date range as whole days', async () => {
    const logs = await service.list({ start_date: '2025-03-02', end_date: '2025-03-03' });
    expect(logs.map((log) => log.id)).toEqual(['log-3', 'log-2']);
  });

  it('should reject a range that ends before it starts', async () => {
    await expect(service.list({ start_date: '2025-03-03', end_date: '2025-03-01' })).rejects.toThrow(
      'start_date must not be after end_date'
    );
  });
});
