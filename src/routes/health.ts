import fs from 'node:fs';
import type { Express, Request, Response } from 'express';

const readPackageVersion = (): string => {
  try {
    const raw = fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    console.warn('[health] package.json unreadable:', error instanceof Error ? error.message : error);
  }
  return '0.0.0';
};

const version = readPackageVersion();

const healthPayload = () => ({
  ok: true,
  service: 'weather-observations-backend',
  version,
  env: process.env.NODE_ENV || 'development',
  uptime: Math.floor(process.uptime()),
  timestamp: new Date().toISOString(),
});

export const registerHealthRoutes = (app: Express) => {
  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload());
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
};
