export type { IChatModel } from "./chat-model.interface.js";
export { OpenAIChatModel, toOpenAiMessages, toChatError } from "./openai-chat-model.js";
export type { OpenAIChatModelConfig, OpenAIChatClient } from "./openai-chat-model.js";
