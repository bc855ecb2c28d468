import { main } from './cli';

main().catch((err: unknown) => {
  console.error('[vaultwatch] Fatal:', err);
  process.exitCode = 1;
});
