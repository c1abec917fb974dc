import { query, type SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import { logger } from '../../../config/logger.js';
import type { AgentToolResult } from '../../../types/stream-events.js';
import type { AgentEngine, AgentRunConfig, AgentRunHooks, ConversationMessage } from '../base.js';

export interface ClaudeAgentEngineOptions {
  /** Working directory the agent operates in */
  cwd?: string;
  /** Restrict the agent to these tools */
  allowedTools?: string[];
}

/**
 * Agent engine backed by the Claude Agent SDK.
 *
 * Assistant content blocks go to `onContent`; tool results (which the SDK
 * reports inside user messages) go to `onToolResult`.
 */
export class ClaudeAgentEngine implements AgentEngine {
  constructor(private readonly options: ClaudeAgentEngineOptions = {}) {}

  async run(args: {
    conversation: ConversationMessage[];
    hooks: AgentRunHooks;
    config: AgentRunConfig;
    signal: AbortSignal;
  }): Promise<void> {
    const { conversation, hooks, config, signal } = args;

    const abortController = new AbortController();
    const onAbort = () => abortController.abort(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const messages = query({
        prompt: buildPrompt(conversation),
        options: {
          abortController,
          model: config.model,
          maxTurns: config.maxTurns,
          cwd: this.options.cwd,
          allowedTools: this.options.allowedTools,
          env: { ...process.env, ANTHROPIC_API_KEY: config.apiKey },
        },
      });

      let messageCount = 0;
      for await (const sdkMsg of messages) {
        messageCount++;
        hooks.onApiExchange(undefined, sdkMsg, undefined);
        await this.dispatch(sdkMsg, hooks);
      }

      logger.debug({ messageCount }, 'Claude SDK query completed');
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async dispatch(sdkMsg: SDKMessage, hooks: AgentRunHooks): Promise<void> {
    switch (sdkMsg.type) {
      case 'assistant': {
        for (const block of sdkMsg.message.content) {
          await hooks.onContent(block);
        }
        return;
      }

      case 'user': {
        const content = sdkMsg.message.content;
        if (typeof content === 'string') {
          return;
        }
        for (const block of content) {
          if (block.type !== 'tool_result') {
            continue;
          }
          await hooks.onToolResult(toToolResult(block.content, block.is_error), block.tool_use_id);
        }
        return;
      }

      case 'result': {
        if (sdkMsg.subtype !== 'success') {
          throw new Error(`SDK execution failed: ${sdkMsg.subtype}`);
        }
        logger.info({ cost: sdkMsg.total_cost_usd, turns: sdkMsg.num_turns }, 'Claude SDK execution completed successfully');
        return;
      }

      default:
        return;
    }
  }
}

function buildPrompt(conversation: ConversationMessage[]): string {
  return conversation
    .filter((message) => message.role === 'user')
    .flatMap((message) => message.content.map((part) => part.text))
    .join('\n\n');
}

type ToolResultContent = string | ReadonlyArray<{ type: string }> | undefined;

function isBase64Source(value: unknown): value is { type: 'base64'; data: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'base64' &&
    'data' in value &&
    typeof value.data === 'string'
  );
}

/**
 * Flatten a tool_result block's content into output text and an optional image
 */
export function toToolResult(content: ToolResultContent, isError: boolean | undefined): AgentToolResult {
  let text: string | null = null;
  let base64Image: string | null = null;

  if (typeof content === 'string') {
    text = content;
  } else if (content) {
    const parts: string[] = [];
    for (const item of content) {
      if (item.type === 'text' && 'text' in item && typeof item.text === 'string') {
        parts.push(item.text);
      } else if (item.type === 'image' && 'source' in item && isBase64Source(item.source)) {
        base64Image = item.source.data;
      }
    }
    text = parts.length > 0 ? parts.join('\n') : null;
  }

  return isError
    ? { output: null, error: text, base64Image }
    : { output: text, error: null, base64Image };
}
