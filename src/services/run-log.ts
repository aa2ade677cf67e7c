import fs from 'node:fs';
import path from 'node:path';

/** Timestamped copy of a run's console lines, kept as `<runDir>/run.log` */
export class RunLog {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(line: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, `${new Date().toISOString()} ${line.trim()}\n`);
  }
}
