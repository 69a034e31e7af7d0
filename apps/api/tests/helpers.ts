import { openDb } from '../src/db.js';
import { createApp } from '../src/app.js';

export type App = ReturnType<typeof createApp>;

export function testApp(): App {
  return createApp(openDb(':memory:'), { today: '2026-01-20' });
}

export async function api(app: App, method: string, path: string, body?: unknown) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json' },
  };
  if (body !== undefined) init.body = JSON.stringify(body);
  const res = await app.request(path, init);
  const data: unknown = await res.json();
  return { status: res.status, data };
}
