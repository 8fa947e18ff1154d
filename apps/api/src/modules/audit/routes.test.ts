import { describe, it, expect, vi, beforeEach } from 'vitest';
import { callRoute } from '../../__tests__/helpers/express';
import { OWNER } from '../../__tests__/helpers/fixtures';

vi.mock('../../services', () => ({
  auditService: { getTrail: vi.fn(), exportTrail: vi.fn() },
}));

vi.mock('../../shared/logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

import { auditService } from '../../services';
import { auditRouter } from './routes';

const CONTRACT_ID = '6f1c2a7e-8d3b-4c55-9a10-2b7e4f9d0c11';

describe('Audit API', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('GET /contracts/:id/trail returns the projection', async () => {
    const trail = { contractId: CONTRACT_ID, events: [], generatedAt: '2025-06-15T12:00:00.000Z' };
    vi.mocked(auditService.getTrail).mockResolvedValue(trail);

    const { res } = await callRoute(auditRouter, 'get', '/contracts/:id/trail', { params: { id: CONTRACT_ID } });

    expect(auditService.getTrail).toHaveBeenCalledWith(OWNER, CONTRACT_ID);
    expect(res.json).toHaveBeenCalledWith(trail);
  });

  it('GET /contracts/:id/export downloads a PDF', async () => {
    vi.mocked(auditService.exportTrail).mockResolvedValue(new Uint8Array([1, 2, 3]));

    const { res } = await callRoute(auditRouter, 'get', '/contracts/:id/export', { params: { id: CONTRACT_ID } });

    expect(res.setHeader).toHaveBeenCalledWith('Content-Disposition', `attachment; filename="audit-${CONTRACT_ID}.pdf"`);
    expect(res.send).toHaveBeenCalledWith(Buffer.from([1, 2, 3]));
  });
});
