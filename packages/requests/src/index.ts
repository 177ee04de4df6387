/**
 * @ballast/requests — Asynchronous deposit / redeem request queue.
 */

export { RequestQueue } from "./request-queue.js";

export type {
  RequestKind,
  RequestStatus,
  Erc7540Request,
  AdmissionContext,
  SettlementContext,
  SettlementResult,
  ClaimContext,
  RequestQueueSnapshot,
  RequestErrorCode,
} from "./types.js";
export { RequestError } from "./types.js";
