import { Request, Response, Router } from 'express';

import { adultSongRequestSchema, kidSongRequestSchema, parseBody } from '../models/SongRequest';
import { GeneratedSong, SongService } from '../services/SongService';
import { logger } from '../utils/logger';
import { handleSongError } from './types';

function toGenerationResponse(song: GeneratedSong) {
  return {
    status: 'pending',
    task_id: song.taskId,
    lyrics: song.lyrics,
    kind: song.kind,
  };
}

export function createSongRoutes(songService: SongService): Router {
  const router = Router();

  router.post('/generate-kid-song', async (req: Request, res: Response) => {
    try {
      const body = parseBody(kidSongRequestSchema, req.body);
      const song = await songService.generateKidSong(body);
      logger.info({ songId: song.taskId, kind: song.kind }, 'Started kid song');
      res.json(toGenerationResponse(song));
    } catch (error) {
      handleSongError(res, error);
    }
  });

  router.post('/generate-adult-song', async (req: Request, res: Response) => {
    try {
      const body = parseBody(adultSongRequestSchema, req.body);
      const song = await songService.generateAdultSong(body);
      logger.info({ songId: song.taskId, kind: song.kind }, 'Started adult song');
      res.json(toGenerationResponse(song));
    } catch (error) {
      handleSongError(res, error);
    }
  });

  router.get('/song-status/:taskId', async (req: Request, res: Response) => {
    try {
      const status = await songService.getStatus(req.params.taskId);
      res.json(status);
    } catch (error) {
      handleSongError(res, error);
    }
  });

  router.get('/full-audio/:taskId', async (req: Request, res: Response) => {
    try {
      const { audioUrl, filename } = await songService.getDownload(req.params.taskId);
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.redirect(302, audioUrl);
    } catch (error) {
      handleSongError(res, error);
    }
  });

  return router;
}
