/**
 * Guide Grabber Repository
 * Clones or updates the grabber checkout and installs its dependencies
 */

import { promises as fs } from 'fs';
import path from 'path';
import { spawnCommand, type CommandRunner } from './command-runner';
import type { AppConfig } from '../types/config';

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export class EpgRepository {
  private readonly config: AppConfig['epg'];
  private readonly run: CommandRunner;

  constructor(config: AppConfig['epg'], run: CommandRunner = spawnCommand) {
    this.config = config;
    this.run = run;
  }

  /** Root of the per-provider channel definitions */
  get sitesDirectory(): string {
    return path.join(this.config.repoDir, 'sites');
  }

  /**
   * Clone when missing, pull otherwise
   */
  async sync(): Promise<'cloned' | 'updated'> {
    await fs.mkdir(this.config.workDir, { recursive: true });

    if (await pathExists(this.config.repoDir)) {
      console.log('Updating EPG repository...');
      await this.run('git', ['pull'], { cwd: this.config.repoDir });
      return 'updated';
    }

    console.log(`Cloning EPG repository from ${this.config.repository}...`);
    await this.run('git', ['clone', '--depth', '1', this.config.repository, this.config.repoDir]);
    return 'cloned';
  }

  async installDependencies(): Promise<void> {
    console.log('Installing grabber dependencies...');
    await this.run('npm', ['install', '--no-audit', '--no-fund'], { cwd: this.config.repoDir });
  }
}
