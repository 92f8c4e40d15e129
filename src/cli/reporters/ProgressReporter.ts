import type { ManifestProgress } from '../../services/ingestion/ManifestIndexer.js';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
};

const fmt = (color: keyof typeof COLORS, text: string): string => `${COLORS[color]}${text}${COLORS.reset}`;

export class ProgressReporter {
  private enabled: boolean;

  constructor(enabled: boolean = true) {
    this.enabled = enabled && process.stdout.isTTY;
  }

  update(progress: ManifestProgress): void {
    if (!this.enabled) return;
    this.clearLine();
    process.stdout.write(
      `${fmt('cyan', `[${progress.current}/${progress.total}]`)} Indexing ${fmt('dim', progress.filename)}`
    );
  }

  complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    console.log(fmt('green', '✓') + ` ${message}`);
  }

  private clearLine(): void {
    if (!this.enabled) return;
    process.stdout.write('\r\x1b[K');
  }
}
