import 'dotenv/config';
import type { Logger } from 'homebridge';
import { CredentialStore } from '../src/api/CredentialStore';
import { SessionManager } from '../src/api/SessionManager';
import { RevealApi } from '../src/api/RevealApi';
import { MediaCache } from '../src/media/MediaCache';
import { SyncCoordinator } from '../src/sync/SyncCoordinator';
import { toEntityAttributes } from '../src/entityAttributes';

const debugEnabled = process.env.REVEAL_DEBUG === '1';

// A console-backed logger for running outside Homebridge
const log: Logger = {
  prefix: 'RevealCellCam',
  info: (...args) => console.log('[INFO]', ...args),
  success: (...args) => console.log('[SUCCESS]', ...args),
  warn: (...args) => console.warn('[WARN]', ...args),
  error: (...args) => console.error('[ERROR]', ...args),
  debug: (...args) => {
    if (debugEnabled) {
      console.log('[DEBUG]', ...args);
    }
  },
  log: (level, ...args) => console.log(`[${level.toUpperCase()}]`, ...args),
};

async function main() {
  const { REVEAL_USERNAME, REVEAL_PASSWORD } = process.env;

  if (!REVEAL_USERNAME || !REVEAL_PASSWORD) {
    log.error('Please create a .env file and provide REVEAL_USERNAME and REVEAL_PASSWORD.');
    process.exitCode = 1;
    return;
  }

  log.info('Running a single sync cycle against the Reveal API...');
  const coordinator = new SyncCoordinator(
    new SessionManager(new CredentialStore(REVEAL_USERNAME, REVEAL_PASSWORD), log),
    new RevealApi(log),
    new MediaCache(log),
    log,
  );

  const outcome = await coordinator.refreshNow();
  if (outcome.status !== 'published') {
    log.error(`Cycle did not publish (${outcome.status}).`);
    process.exitCode = 1;
    return;
  }

  for (const entry of outcome.snapshot.entries.values()) {
    console.log(JSON.stringify(toEntityAttributes(entry), null, 2));
    const image = coordinator.getImage(entry.device.device_id);
    log.info(`${entry.device.display_name}: ${image ? `${image.length} bytes of photo cached` : 'no photo'}.`);
  }
}

main().catch((error: unknown) => {
  log.error('Sync cycle failed:', error);
  process.exitCode = 1;
});
