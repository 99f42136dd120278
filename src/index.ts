#!/usr/bin/env node
/**
 * quran-epg
 * Main entry point: one run, exit code tells the scheduler how it went
 */

import 'dotenv/config';
import { RadioQuranClient } from './api/radio-quran-client';
import { SepehrClient } from './api/sepehr-client';
import { createAuthorizationProvider } from './auth/authorization';
import { QURAN_TV, RADIO_QURAN } from './epg/channels';
import { getConfig } from './types/config';
import { EPGUpdater } from './updater/epg-updater';

async function main(): Promise<number> {
  console.log('========================================');
  console.log('quran-epg v1.0.0');
  console.log('========================================');

  // Load configuration; credential problems stop the run before any request
  const config = getConfig();
  const authorization = createAuthorizationProvider(config.sepehr.auth);

  console.log('\nConfiguration:');
  console.log(`  Sepehr auth: ${authorization.scheme}`);
  console.log(`  EPG Days: ${config.sepehr.days}`);
  console.log(`  Timezone: ${config.timezone}`);
  console.log(`  Output: ${config.output.filename}`);
  console.log('');

  const updater = new EPGUpdater(config, [
    new SepehrClient(config, QURAN_TV, authorization),
    new RadioQuranClient(config, RADIO_QURAN),
  ]);

  const result = await updater.update();
  if (!result.success) {
    console.error(result.message);
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
