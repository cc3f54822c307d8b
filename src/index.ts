export { SteamApiClient, type SteamApiClientOptions } from './api/steamApi';
export { SteamSession, generateUmqid, type SessionInit, type SessionSnapshot } from './api/session';
export { HttpClient, HttpRequest, type HttpClientOptions, type HttpOutcome, type HttpRequestSpec } from './api/http/httpClient';
export { batchSteamIds, joinSteamIds, SUMMARIES_BATCH_LIMIT } from './api/summaryBatcher';
export type { RelogonState } from './api/relogon';
export {
    MESSAGE_TYPES,
    OPERATION_NAMES,
    PERSONA_STATES,
    PersonaState,
    parseMessageType,
    personaStateFromName,
    personaStateName,
    type ApiResult,
    type Credentials,
    type MessageType,
    type OperationKind,
    type OutgoingMessage,
    type PersonaStateName,
    type SteamMessage,
    type SteamSummary,
} from './api/types';
export { SteamApiError, STEAM_API_ERROR_KINDS, type SteamApiErrorKind } from './utils/errors';
export { loadConfiguration, type Configuration } from './configuration';
