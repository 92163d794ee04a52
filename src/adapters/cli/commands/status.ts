import { Command } from 'commander';
import { join } from 'path';
import { CheckpointStore, listSlideImages } from '../../../core/index.js';

interface StatusOptions {
  slides?: string;
  checkpoint?: string;
  reportDir: string;
}

export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Show progress of an interrupted slide extraction pass')
    .option('-s, --slides <dir>', 'slide image folder (to show remaining slides)')
    .option('--checkpoint <path>', 'checkpoint file path')
    .option('--report-dir <dir>', 'report directory', 'logs')
    .action(async (options: StatusOptions) => {
      const checkpointPath = options.checkpoint ?? join(options.reportDir, 'slides_checkpoint.json');
      const store = new CheckpointStore(checkpointPath);
      const checkpoint = await store.load();

      if (!checkpoint) {
        console.log('✅ No pending checkpoint. The last extraction pass completed (or never started).');
        console.log(`   Path: ${checkpointPath}`);
        return;
      }

      const total = options.slides ? (await listSlideImages(options.slides)).length : undefined;

      console.log('');
      console.log('┌─────────────────────────────────────────────────────┐');
      console.log(`│ Checkpoint: ${checkpoint.timestamp.padEnd(39)} │`);
      console.log('├─────────────────────────────────────────────────────┤');
      console.log(`│ ✅ Processed: ${String(checkpoint.processed_count).padStart(4)}                                  │`);
      if (total !== undefined) {
        const remaining = Math.max(total - checkpoint.processed_count, 0);
        console.log(`│ ⬚  Remaining: ${String(remaining).padStart(4)}                                  │`);
      }
      console.log('└─────────────────────────────────────────────────────┘');

      const empty = checkpoint.processed.filter((unit) => unit.word_count === 0);
      if (empty.length > 0) {
        console.log('\nSlides without text:');
        for (const unit of empty) {
          console.log(`  - [${unit.index}] ${unit.name}`);
        }
      }
    });

  return command;
}
