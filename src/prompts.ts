import type { ChatMessage } from './types.js';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant. Use the available tools when they help answer the question.';

export const NEWS_SYSTEM_PROMPT = 'You are a professional news presenter. Fetch the latest news and give a concise, clear summary.';
export const NEWS_USER_PROMPT = "Search for today's latest news and summarise the key points, listing the specific events.";

export const SEARCH_SYSTEM_PROMPT = 'You are a research assistant. Search the web for the question, then answer briefly and cite the sources you used.';

export const BROADCAST_SYSTEM_PROMPT = 'You are a news reporter.';

// Sent as a lone user turn; the restyled text replaces the final answer
export function buildFormattingRequest(answer: string, instruction: string): ChatMessage {
  return {
    role: 'user',
    content: `${answer}\n\nPlease reorganise your reply according to these requirements: ${instruction}`,
    toolCalls: [],
  };
}

export const systemMessage = (content: string): ChatMessage => ({ role: 'system', content, toolCalls: [] });
export const userMessage = (content: string): ChatMessage => ({ role: 'user', content, toolCalls: [] });
