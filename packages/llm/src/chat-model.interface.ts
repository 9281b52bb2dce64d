import type { ChatRequest, ChatTurn } from "@contract-qa/types";

export interface IChatModel {
  readonly name: string;
  readonly model: string;

  /** One model turn: either tool calls to run or a final message. */
  complete(request: ChatRequest): Promise<ChatTurn>;
}
