/**
 * Guide Grabber
 * Runs the grabber against channels.xml and collects the resulting guide
 */

import { promises as fs } from 'fs';
import path from 'path';
import { spawnCommand, type CommandRunner } from './command-runner';
import { pathExists } from './epg-repository';
import { validateGuide } from '../xmltv/validator';
import { ExternalToolError } from '../utils/errors';
import type { AppConfig } from '../types/config';

export const CHANNELS_FILENAME = 'channels.xml';
export const GUIDE_FILENAME = 'guide.xml';

export interface GrabResult {
  guidePath: string;
  sizeBytes: number;
  warnings: string[];
}

/**
 * True when the file exists and was modified less than maxAgeHours ago
 */
export async function isFileRecent(
  filePath: string,
  maxAgeHours: number,
  now: number = Date.now()
): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return now - stats.mtimeMs < maxAgeHours * 3600 * 1000;
  } catch {
    return false;
  }
}

export class GuideGrabber {
  private readonly config: AppConfig;
  private readonly run: CommandRunner;

  constructor(config: AppConfig, run: CommandRunner = spawnCommand) {
    this.config = config;
    this.run = run;
  }

  get channelsPath(): string {
    return path.join(this.config.epg.repoDir, CHANNELS_FILENAME);
  }

  buildArgs(): string[] {
    return [
      'run',
      'grab',
      '--',
      `--channels=${CHANNELS_FILENAME}`,
      `--output=${GUIDE_FILENAME}`,
      `--maxConnections=${this.config.epg.maxConnections}`,
      `--days=${this.config.epg.days}`,
    ];
  }

  /**
   * Invoke the grabber and copy its guide to the configured output path.
   * A non-zero exit, or a clean exit without a guide file, is an ExternalToolError.
   */
  async grab(): Promise<GrabResult> {
    const args = this.buildArgs();
    console.log(
      `Settings: ${this.config.epg.maxConnections} parallel connections, ${this.config.epg.days} day(s) of data`
    );
    console.log(`Running: npm ${args.join(' ')}`);

    await this.run('npm', args, {
      cwd: this.config.epg.repoDir,
      env: {
        ...process.env,
        NODE_OPTIONS: `--max-old-space-size=${this.config.epg.memoryMb}`,
      },
    });

    const producedGuide = path.join(this.config.epg.repoDir, GUIDE_FILENAME);
    if (!(await pathExists(producedGuide))) {
      throw new ExternalToolError('npm run grab', `completed but ${GUIDE_FILENAME} was not created`);
    }

    const content = await fs.readFile(producedGuide, 'utf-8');
    const validation = validateGuide(content);
    const warnings = [...validation.warnings];
    if (!validation.valid) {
      warnings.push(`Guide failed validation: ${validation.error}`);
    }

    const guidePath = path.resolve(this.config.output.guide);
    await fs.mkdir(path.dirname(guidePath), { recursive: true });
    await fs.copyFile(producedGuide, guidePath);

    return { guidePath, sizeBytes: Buffer.byteLength(content, 'utf-8'), warnings };
  }
}
