// backend/services/scoring/src/dispatch/types.ts
import type { RawInput } from "../../../shared/src/dto/RequestDtoBase";
import type { StatusCode } from "../../../shared/src/http/envelope";
import type { IStore } from "../../../shared/src/store/IStore";
import type { MethodRequest } from "../dto/method.request";

/** What the transport hands to dispatch: the parsed JSON body. */
export type DispatchRequest = {
  body: RawInput;
};

/**
 * Call-scoped context. Handlers record what they saw so the transport can
 * log it alongside the response.
 */
export type RequestContext = {
  requestId: string;
  /** online_score: argument names that carried a value. */
  has?: string[];
  /** clients_interests: number of requested client ids. */
  nclients?: number;
};

export type ErrorPayload = {
  code: StatusCode;
  error: string;
};

export type ScorePayload = { score: number };

export type InterestsPayload = Record<string, string[]>;

export type ResponsePayload = ErrorPayload | ScorePayload | InterestsPayload;

export type DispatchResult = {
  response: ResponsePayload | null;
  code: StatusCode;
};

export type MethodDeps = {
  store: IStore;
};

export type MethodHandlerFn = (
  request: MethodRequest,
  ctx: RequestContext,
  deps: MethodDeps
) => Promise<DispatchResult>;
