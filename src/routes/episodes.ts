import { Router, Request, Response, NextFunction } from 'express';
import { isSimError } from '../errors';
import { getSessions, type Session, type SessionRegistry } from '../sessions';

type SessionRequest = Request<{ sessionId: string }>;

const router = Router();

function requireRegistry(res: Response): SessionRegistry | null {
  const registry = getSessions();
  if (!registry) {
    res.status(503).json({ error: 'Session registry is not initialized' });
    return null;
  }
  return registry;
}

function requireSession(req: SessionRequest, res: Response): Session | null {
  const registry = requireRegistry(res);
  if (!registry) return null;

  const session = registry.get(req.params.sessionId);
  if (!session) {
    res.status(404).json({ error: 'Session not found' });
    return null;
  }
  return session;
}

export function openSession(req: Request, res: Response): void {
  const registry = requireRegistry(res);
  if (!registry) return;

  const session = registry.create();
  if (!session) {
    res.status(503).json({ error: 'Too many open sessions' });
    return;
  }

  const observation = session.env.episodeStart();

  res.status(201).json({
    sessionId: session.id,
    observation,
    objective: session.env.objective,
    encoding: session.env.encoding,
  });
}

export function resetSession(req: SessionRequest, res: Response): void {
  const session = requireSession(req, res);
  if (!session) return;

  const observation = session.env.episodeStart();

  res.status(200).json({
    observation,
    episode: session.env.numEpisodes,
  });
}

export function stepSession(req: SessionRequest, res: Response, next: NextFunction): void {
  const session = requireSession(req, res);
  if (!session) return;

  try {
    const { observation, reward, terminal } = session.env.step(req.body);

    res.status(200).json({
      observation,
      reward,
      terminal,
      steps: session.env.getState().steps,
    });
  } catch (err) {
    if (isSimError(err) && err.kind === 'InvalidAction') {
      res.status(400).json({ error: err.message, kind: err.kind });
      return;
    }
    next(err);
  }
}

export function describeSession(req: SessionRequest, res: Response): void {
  const session = requireSession(req, res);
  if (!session) return;

  const { env } = session;

  res.status(200).json({
    sessionId: session.id,
    createdAt: session.createdAt.toISOString(),
    episodes: env.numEpisodes,
    steps: env.getState().steps,
    terminal: env.isTerminal(),
    observation: env.observation(),
  });
}

export function closeSession(req: SessionRequest, res: Response): void {
  const registry = requireRegistry(res);
  if (!registry) return;

  if (!registry.close(req.params.sessionId)) {
    res.status(404).json({ error: 'Session not found' });
    return;
  }

  res.status(204).end();
}

router.post('/', openSession);
router.post('/:sessionId/reset', resetSession);
router.post('/:sessionId/step', stepSession);
router.get('/:sessionId', describeSession);
router.delete('/:sessionId', closeSession);

export default router;
