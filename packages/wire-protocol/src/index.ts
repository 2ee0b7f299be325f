export type {
  PlayerAction,
  RequestEnvelope,
  ResponseEnvelope,
  PlayerSnapshot,
  BetTurn,
  ServerMessage,
  EventTypeName,
} from './types.js';
export { EventType, FOLD_AMOUNT, DecodeError, EncodeError } from './types.js';
export {
  encodeRequest,
  decodeResponse,
  classifyResponse,
  isBareError,
  isUnclassified,
} from './codec.js';
export { ResponseEnvelopeSchema, RegistrationSchema, BetAmountSchema } from './schemas.js';
