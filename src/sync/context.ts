import type { CommentGateway } from "../gitlab/gateway.js";
import type { Logger } from "../logger.js";
import type { ActionLog } from "./outcome.js";

/** Everything one reconciliation pass shares between its steps. */
export interface PassContext {
  gateway: CommentGateway;
  dangerId: string;
  logger: Logger;
  actions: ActionLog;
}
