import { ContentOracle, ContentTurn, OracleResponse } from '../../types/index.js';

export interface RecordedCall {
  systemPrompt: string;
  turns: ContentTurn[];
}

type Reply = string | OracleResponse | ((turns: ContentTurn[]) => string | Promise<string>);

/**
 * In-process oracle: serves queued replies in order and records every call.
 * The last reply is reused once the queue runs out.
 */
export class FakeOracle implements ContentOracle {
  readonly calls: RecordedCall[] = [];
  private readonly replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  async complete(systemPrompt: string, turns: ContentTurn[]): Promise<OracleResponse> {
    this.calls.push({ systemPrompt, turns });
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];

    if (reply === undefined) return { model: 'fake', content: '' };
    if (typeof reply === 'string') return { model: 'fake', content: reply };
    if (typeof reply === 'function') return { model: 'fake', content: await reply(turns) };
    return reply;
  }
}

export function textOf(turn: ContentTurn | undefined): string {
  return turn?.type === 'text' ? turn.text : '';
}
