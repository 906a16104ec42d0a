import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { sign } from 'jsonwebtoken';
import { UserRole } from '../../src/models/auth/user.model';
import { CreateProjectRequest } from '../../src/models/business/project.model';
import { DocumentPolicy, UploadedDocument } from '../../src/services/business/po-binder';
import { TEST_JWT_SECRET, TEST_USER_ID } from '../setup';

export const TEST_HOST_URL = 'http://localhost:8000';

export const testPolicy: DocumentPolicy = {
  maxDocuments: 20,
  maxFileSizeBytes: 10 * 1024 * 1024,
  allowedExtensions: ['.pdf', '.doc', '.docx', '.jpg', '.jpeg', '.png', '.txt', '.xlsx', '.xls'],
};

export const makeDocument = (originalname: string, content = 'document body'): UploadedDocument => {
  const buffer = Buffer.from(content);
  return { originalname, size: buffer.length, buffer };
};

export const projectRequest = (overrides: Partial<CreateProjectRequest> = {}): CreateProjectRequest => ({
  name: 'Riverside Warehouse',
  description: null,
  location: 'Pune',
  start_date: '2025-01-01',
  end_date: '2025-06-30',
  po_balance: 0,
  estimated_balance: 0,
  actual_balance: 0,
  pos: [],
  ...overrides,
});

export const createUploadRoot = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'sitebooks-uploads-'));

export const removeUploadRoot = (root: string): Promise<void> => fs.rm(root, { recursive: true, force: true });

/**
 * Every file below `root`, as paths relative to it, sorted.
 */
export const listFiles = async (root: string): Promise<string[]> => {
  const found: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        found.push(path.relative(root, full).split(path.sep).join('/'));
      }
    }
  };
  await walk(root);
  return found.sort();
};

export const tokenFor = (role: UserRole, userId: string = TEST_USER_ID): string =>
  sign({ sub: userId, role }, TEST_JWT_SECRET, { expiresIn: '1h' });
