import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { CatalogVideo, VideoIndex } from '../../../core/entities/Video.js';
import type { ICatalogRepository } from '../../../core/interfaces/ICatalogRepository.js';

const VideoRowSchema = z.object({
  video_id: z.string(),
  index_id: z.string(),
  task_handle: z.string(),
  filename: z.string(),
  file_path: z.string(),
  duration_sec: z.number().nullable(),
  ingested_at: z.string(),
});

const MetaRowSchema = z.object({ value: z.string() });

function toVideo(row: unknown): CatalogVideo {
  const r = VideoRowSchema.parse(row);
  return {
    videoId: r.video_id,
    indexId: r.index_id,
    taskHandle: r.task_handle,
    filename: r.filename,
    filePath: r.file_path,
    durationSec: r.duration_sec ?? undefined,
    ingestedAt: new Date(r.ingested_at),
  };
}

/**
 * SQLite implementation of the video catalog
 */
export class CatalogRepository implements ICatalogRepository {
  constructor(private db: Database.Database) {}

  getActiveIndex(): VideoIndex | null {
    const stmt = this.db.prepare('SELECT value FROM catalog_meta WHERE key = ?');
    const id = stmt.get('index_id');
    const name = stmt.get('index_name');
    if (!id) return null;

    return {
      id: MetaRowSchema.parse(id).value,
      name: name ? MetaRowSchema.parse(name).value : '',
    };
  }

  setActiveIndex(index: VideoIndex): void {
    const stmt = this.db.prepare('INSERT OR REPLACE INTO catalog_meta (key, value) VALUES (?, ?)');
    const save = this.db.transaction(() => {
      stmt.run('index_id', index.id);
      stmt.run('index_name', index.name);
    });
    save();
  }

  saveVideo(video: CatalogVideo): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO videos (video_id, index_id, task_handle, filename, file_path, duration_sec, ingested_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      video.videoId,
      video.indexId,
      video.taskHandle,
      video.filename,
      video.filePath,
      video.durationSec ?? null,
      video.ingestedAt.toISOString()
    );
  }

  getVideo(videoId: string): CatalogVideo | null {
    const row = this.db.prepare('SELECT * FROM videos WHERE video_id = ?').get(videoId);
    return row ? toVideo(row) : null;
  }

  findByFilePath(filePath: string): CatalogVideo | null {
    const row = this.db
      .prepare('SELECT * FROM videos WHERE file_path = ? ORDER BY ingested_at DESC LIMIT 1')
      .get(filePath);
    return row ? toVideo(row) : null;
  }

  listVideos(): CatalogVideo[] {
    return this.db.prepare('SELECT * FROM videos ORDER BY filename ASC').all().map(toVideo);
  }
}
