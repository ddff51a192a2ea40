import { Request, Response, Router } from 'express';

import { SiteConfig } from '../config/appConfig';
import { shareSubtitleFor, toShareResponse } from '../models/ShareRecord';
import { NotReadyError, ShareNotFoundError } from '../models/SongError';
import { createShareLinkRequestSchema, parseBody } from '../models/SongRequest';
import { ShareManager } from '../services/ShareManager';
import { SongService } from '../services/SongService';
import { logger } from '../utils/logger';
import { shareLinkUrl, viewerUrl } from '../utils/links';
import { renderUnfurlPage } from '../views/unfurlPage';
import { handleSongError } from './types';

export function createShareRoutes(shareManager: ShareManager, songService: SongService, site: SiteConfig): Router {
  const router = Router();

  router.post('/create-share-link', async (req: Request, res: Response) => {
    try {
      const body = parseBody(createShareLinkRequestSchema, req.body);
      const audioUrl = await songService.findAudioUrl(body.song_id);
      if (!audioUrl) {
        throw new NotReadyError('Song not ready');
      }
      const token = await shareManager.create({
        songId: body.song_id,
        audioUrl,
        title: body.title,
        subtitle: shareSubtitleFor(body.recipient_name, body.subject),
        recipientName: body.recipient_name,
        subject: body.subject,
        lyrics: body.lyrics,
      });
      res.json({ share_url: shareLinkUrl(site, token), token });
    } catch (error) {
      handleSongError(res, error);
    }
  });

  router.get('/share/:token', async (req: Request, res: Response) => {
    try {
      const record = await shareManager.get(req.params.token);
      if (!record) {
        throw new ShareNotFoundError();
      }
      res.json(toShareResponse(record));
    } catch (error) {
      handleSongError(res, error);
    }
  });

  router.get('/s/:token', async (req: Request, res: Response) => {
    const { token } = req.params;
    const record = await shareManager.get(token).catch((error: unknown) => {
      logger.error({ error }, 'Share lookup failed while rendering unfurl page');
      return null;
    });
    const html = renderUnfurlPage(record, {
      pageUrl: shareLinkUrl(site, token),
      redirectUrl: viewerUrl(site, token),
      imageUrl: site.shareImageUrl,
    });
    res.status(200).type('html').send(html);
  });

  return router;
}
