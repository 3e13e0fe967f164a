import type { Request, Response } from 'express';
import type { Database } from '../config/database';

export const SERVICE_NAME = 'outlook-mailbox-gateway';
export const SERVICE_VERSION = '1.0.0';

export class HealthController {
  constructor(private readonly db: Database) {}

  /**
   * Basic health check
   */
  async check(_req: Request, res: Response): Promise<void> {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  /**
   * Check the credential store connection
   */
  async checkIntegrations(_req: Request, res: Response): Promise<void> {
    const integrations = {
      database: 'unknown',
    };

    try {
      await this.db.ping();
      integrations.database = 'ok';
    } catch (error) {
      integrations.database = 'error';
      console.error('Database health check failed:', error instanceof Error ? error.message : error);
    }

    const allOk = Object.values(integrations).every((status) => status === 'ok');

    res.status(allOk ? 200 : 503).json({
      status: allOk ? 'ok' : 'degraded',
      integrations,
      timestamp: new Date().toISOString(),
    });
  }
}
