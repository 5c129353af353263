import { runMergeCli } from './lib/merge/cli.js';

async function main(): Promise<void> {
  const exitCode = await runMergeCli(process.argv.slice(2));
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
