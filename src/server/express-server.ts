/**
 * Express HTTP Server
 * Serves the filtered playlist and guide to the media server
 */

import express, { Express, Request, Response } from 'express';
import type { Server } from 'http';
import { promises as fs } from 'fs';
import path from 'path';
import type { AppConfig } from '../types/config';

export interface FileStatus {
  exists: boolean;
  size: number;
  lastModified: string | null;
}

export interface ServerStatus {
  server: string;
  playlist: FileStatus;
  guide: FileStatus;
  sourceUrl: string;
  serverTime: string;
}

const PLAYLIST_CONTENT_TYPE = 'audio/x-mpegurl; charset=UTF-8';
const GUIDE_CONTENT_TYPE = 'application/xml; charset=UTF-8';

async function fileStatus(filePath: string): Promise<FileStatus> {
  try {
    const stats = await fs.stat(filePath);
    return { exists: true, size: stats.size, lastModified: stats.mtime.toISOString() };
  } catch {
    return { exists: false, size: 0, lastModified: null };
  }
}

export class EPGServer {
  private readonly app: Express;
  private readonly config: AppConfig;

  constructor(config: AppConfig) {
    this.config = config;
    this.app = express();
    this.setupRoutes();
  }

  get application(): Express {
    return this.app;
  }

  private setupRoutes() {
    const playlist = this.serveFile(this.config.output.playlist, PLAYLIST_CONTENT_TYPE, 'Playlist');
    const guide = this.serveFile(this.config.output.guide, GUIDE_CONTENT_TYPE, 'EPG');

    this.app.get('/playlist.m3u', playlist);
    this.app.get('/playlist-filtered.m3u', playlist); // Alias

    this.app.get('/guide.xml', guide);
    this.app.get('/epg.xml', guide); // Alias
    this.app.get('/xmltv.xml', guide); // Alias

    this.app.get('/status', this.serveStatus.bind(this));
    this.app.get('/health', this.serveHealth.bind(this));
  }

  private serveFile(filePath: string, contentType: string, label: string) {
    const absolute = path.resolve(filePath);

    return async (_req: Request, res: Response) => {
      try {
        const content = await fs.readFile(absolute, 'utf-8');
        res.set({
          'Content-Type': contentType,
          'Cache-Control': 'public, max-age=1800',
          'Access-Control-Allow-Origin': '*',
        });
        res.send(content);
      } catch (error) {
        console.error(`Error serving ${label}:`, error);
        res
          .status(404)
          .type('text/plain')
          .send(`${label} file not found. Run the generator first.`);
      }
    };
  }

  private async serveStatus(_req: Request, res: Response) {
    const status: ServerStatus = {
      server: 'running',
      playlist: await fileStatus(path.resolve(this.config.output.playlist)),
      guide: await fileStatus(path.resolve(this.config.output.guide)),
      sourceUrl: this.config.playlist.url,
      serverTime: new Date().toISOString(),
    };

    res.set('Access-Control-Allow-Origin', '*');
    res.json(status);
  }

  private serveHealth(_req: Request, res: Response) {
    res.set('Content-Type', 'text/plain');
    res.send('OK');
  }

  start(port: number = this.config.server.port): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        console.log(`HTTP Server started on port ${port}`);
        console.log(`  M3U URL: http://localhost:${port}/playlist.m3u`);
        console.log(`  EPG URL: http://localhost:${port}/guide.xml`);
        resolve(server);
      });
      server.once('error', reject);
    });
  }
}
