/**
 * agents/index.ts: Barrel export for the session layer.
 *
 * `middleware/` holds stateless request plumbing; `agents/` holds the modules
 * that reason about a quiz session as a whole:
 *   • Session Discovery: which sittings the site offers
 *   • Carry Tokens: the hidden-token relay between steps
 *   • Session Walker: the step state machine
 */

export {
  parseSessionList,
  discoverSessions,
  resolveSessions,
} from './sessionDiscovery';
export type { LandingFetcher } from './sessionDiscovery';

export {
  CONTINUE_RESULT,
  INITIAL_CARRY,
  buildStepForm,
  parseCarrySet,
  readSessionId,
  showsStep,
  stepMarker,
} from './carryTokens';

export { SessionWalker } from './sessionWalker';
export type {
  RecordSink,
  SessionWalkerOptions,
  StepFetcher,
} from './sessionWalker';
