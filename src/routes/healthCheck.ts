import { Router, Request, Response } from 'express';
import { getSessions } from '../sessions';

const router = Router();

export function healthCheck(req: Request, res: Response): void {
  res.status(200).json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: process.env.NODE_ENV || 'development',
    openSessions: getSessions()?.size() ?? 0,
  });
}

router.get('/', healthCheck);

export default router;
