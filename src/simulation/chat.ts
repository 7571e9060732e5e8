import { readFileSync } from 'node:fs';
import { z } from 'zod';

const CHAT_LINES_FILE = new URL('../../data/chat-lines.json', import.meta.url);

export const ChatScriptSchema = z.object({
  channels: z.array(z.string().min(1)).min(1),
  lines: z.array(z.string().min(1)).min(1),
});

export type ChatScript = z.infer<typeof ChatScriptSchema>;

export function loadChatScript(file: URL | string = CHAT_LINES_FILE): ChatScript {
  return ChatScriptSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}
