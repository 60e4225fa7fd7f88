export {
  APPLICATION_OCTET_STREAM,
  essence,
  formatMediaRange,
  formatMediaType,
  isSameEssence,
  mediaTypeFromExtension,
  parseAcceptHeader,
  parseMediaRange,
  parseMediaType,
} from "./media-type";
export type { MediaRange, MediaType } from "./media-type";

export {
  compareScores,
  matchSpecificity,
  negotiate,
  rankCandidates,
  scoreMediaType,
} from "./negotiation";
export type {
  MatchSpecificity,
  NegotiationScore,
  RankedCandidate,
} from "./negotiation";

export { MediaTypeParseError, UnsupportedMediaTypeError } from "./errors";
