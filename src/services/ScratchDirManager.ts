import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/** A private temporary directory, created on first use and removed on close. */
export class ScratchDirManager {
  private dirPath: string | null = null;

  constructor(
    private readonly root: string = os.tmpdir(),
    private readonly prefix: string = 'service-'
  ) {}

  get created(): boolean {
    return this.dirPath !== null;
  }

  dir(): string {
    if (this.dirPath === null) {
      fs.mkdirSync(this.root, { recursive: true });
      // mkdtemp creates the directory with mode 0700
      this.dirPath = fs.mkdtempSync(path.join(this.root, this.prefix));
    }
    return this.dirPath;
  }

  close(): void {
    if (this.dirPath === null) {
      return;
    }
    fs.rmSync(this.dirPath, { recursive: true, force: true });
    this.dirPath = null;
  }
}
