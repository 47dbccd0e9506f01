export { IllegalActionError, InvariantViolationError, GameOptionsError } from "./errors";
export { loadGameOptions } from "./options";
export {
  SEATS,
  nextSeat,
  seatForDealIndex,
  createInitialState,
  cloneState,
  currentTrick,
  currentPlayer,
  isTerminal,
  getReturns,
  countAllCards,
  type Draft,
  type GameDraft,
} from "./game-state";
export { PhaseMachine, phaseMachine, advancePhase, type TransitionResult } from "./phase-machine";
export {
  COMBO_CATEGORIES,
  makeCombination,
  combinationKey,
  combinationCounts,
  generateCombinations,
} from "./patterns";
export {
  MAX_BID,
  NUM_FACE_UP_SLOTS,
  FACE_UP_SLOT_BASE,
  DEAL_ACTION_BASE,
  PASS,
  BID_ACTION_BASE,
  PLAY_ACTION_BASE,
  PLAY_BANDS,
  NUM_DISTINCT_ACTIONS,
  BOMB_ACTION_BASE,
  ROCKET_ACTION,
  bandOf,
  faceUpSlotAction,
  dealAction,
  bidAction,
  encodeCombination,
  decodeAction,
  isPlayAction,
  isBombAction,
  combinationOf,
  actionToHand,
  type PlayBand,
  type DecodedAction,
} from "./action-space";
export { beats, actionBeats, searchLegalPlays } from "./combinations";
export { dealLegalActions, applyDealAction } from "./deal";
export { biddingLegalActions, applyBiddingAction } from "./auction";
export { playLegalActions, applyPlayAction } from "./play";
export { isSpring, payingAmount, computeReturns, type SettlementInput } from "./settlement";
export {
  getLegalActions,
  validateAction,
  expectedActor,
  chanceOutcomes,
  type ActionValidationResult,
} from "./action-validator";
export { applyAction } from "./reducer";
export { createPlayerView } from "./state-filter";
export { actionToString, originalDeal, formatState } from "./format";
export { SeededRng, createRng } from "./prng";
export { playRandomGame, type RandomGameResult } from "./simulate";
export { DouDizhuGame } from "./game";
