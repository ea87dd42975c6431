#!/usr/bin/env tsx
/**
 * Quick health check for all services
 * Usage: npm run healthcheck
 */

const SERVICES = [
  { name: 'gateway', port: 4000 },
  { name: 'identity', port: 4001 },
  { name: 'social', port: 4002 },
  { name: 'messaging', port: 4003 },
];

async function checkHealth(port: number): Promise<boolean> {
  try {
    const res = await fetch(`http://localhost:${port}/healthz`, {
      signal: AbortSignal.timeout(3000),
    });
    return res.ok;
  } catch {
    return false;
  }
}

async function main() {
  console.log('Checking service health...\n');

  const results = await Promise.all(
    SERVICES.map(async ({ name, port }) => ({ name, port, ok: await checkHealth(port) })),
  );

  let allOk = true;
  for (const { name, port, ok } of results) {
    const status = ok ? '\x1b[32m✓\x1b[0m' : '\x1b[31m✗\x1b[0m';
    console.log(`${status} ${name.padEnd(15)} :${port}`);
    if (!ok) allOk = false;
  }

  console.log('');
  if (allOk) {
    console.log('\x1b[32mAll services healthy!\x1b[0m');
    process.exit(0);
  }
  console.log('\x1b[33mSome services not responding. Start each one with `npm start -w <workspace>`.\x1b[0m');
  process.exit(1);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
