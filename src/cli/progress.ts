import chalk from "chalk";
import cliProgress from "cli-progress";

/**
 * Byte progress for one segment transfer. When the device sends no
 * Content-Length the bar total follows the bytes received.
 */
export class DownloadProgress {
  private readonly bar: cliProgress.SingleBar;
  private readonly label: string;
  private started = false;

  constructor(
    label: string,
    private readonly enabled: boolean = process.stdout.isTTY === true,
  ) {
    this.bar = new cliProgress.SingleBar(
      {
        format:
          `${chalk.blueBright("{label}")} ` +
          `${chalk.cyan("{bar}")} ` +
          `${chalk.white("{percentage}%")} | ` +
          `${chalk.green("{size}")}`,
        barCompleteChar: "█",
        barIncompleteChar: "░",
        hideCursor: true,
        clearOnComplete: true,
      },
      cliProgress.Presets.shades_classic,
    );
    this.label = label;
  }

  update(received: number, total: number | undefined): void {
    if (!this.enabled) {
      return;
    }
    const size = formatBytes(received);
    const barTotal = Math.max(total ?? received, 1);
    if (!this.started) {
      this.bar.start(barTotal, received, { label: this.label, size });
      this.started = true;
      return;
    }
    this.bar.setTotal(barTotal);
    this.bar.update(received, { label: this.label, size });
  }

  stop(): void {
    if (this.started) {
      this.bar.stop();
      this.started = false;
    }
  }
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KiB", "MiB", "GiB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}
