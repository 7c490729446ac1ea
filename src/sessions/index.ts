export {
  type SessionRegistryOptions,
  type Session,
  type SessionRegistry,
  createSessionRegistry,
  initSessions,
  getSessions,
  _resetSessionRegistry,
} from './sessionRegistry';
