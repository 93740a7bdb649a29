import { DateTime } from 'luxon';
import { TranscriptEntry } from '../types/call';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { buildInstructions, GREETING_INSTRUCTION } from '../utils/prompts';
import { DialogueState } from './dialogue-state.service';
import { formatKnowledge, loadKnowledge } from './knowledge.service';
import { CallLifecycleLogger } from './call-logging.service';
import { CallTools, ToolDependencies } from './tools.service';

/** Everything that belongs to one call. Nothing here is shared between calls. */
export interface CallContext {
  callSid: string;
  callerNumber?: string;
  startedAt: DateTime;
  timezone: string;
  state: DialogueState;
}

export interface SessionStartOptions {
  instructions: string;
  tools: CallTools;
}

/** Implemented by the voice runtime that owns speech, media and the turn loop. */
export interface VoiceSession {
  start(options: SessionStartOptions): Promise<void>;
  generateReply(instructions: string): Promise<void>;
  history(): TranscriptEntry[];
}

export interface CallSessionOptions {
  greetingDelayMs: number;
  businessName: string;
  knowledge: string;
  callLogger: Pick<CallLifecycleLogger, 'summarizeAndLog'>;
  tools: Partial<ToolDependencies>;
  clock: () => DateTime;
}

export function createCallContext(
  callSid: string,
  callerNumber?: string,
  timezone: string = env.BUSINESS_TIMEZONE,
  now: DateTime = DateTime.now()
): CallContext {
  return {
    callSid,
    callerNumber,
    startedAt: now.setZone(timezone),
    timezone,
    state: new DialogueState(),
  };
}

export function formatTranscript(entries: TranscriptEntry[]): string {
  return entries
    .filter((entry) => entry.text.trim().length > 0)
    .map((entry) => `[${entry.role}] ${entry.text.trim()}`)
    .join('\n');
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs one call: starts the voice session and the greeting side by side, waits for both
 * to settle, then always logs the call and drops its state, even when the session fails.
 */
export async function runCallSession(
  session: VoiceSession,
  context: CallContext,
  options: Partial<CallSessionOptions> = {}
): Promise<void> {
  const clock = options.clock ?? (() => DateTime.now().setZone(context.timezone));
  const callLogger = options.callLogger ?? new CallLifecycleLogger();
  const tools = new CallTools(context, { clock, ...options.tools });

  const instructions = buildInstructions({
    businessName: options.businessName ?? env.BUSINESS_NAME,
    now: clock(),
    knowledge: options.knowledge ?? formatKnowledge(loadKnowledge()),
    known: context.state.describe(),
  });

  logger.info('Call session started', { callSid: context.callSid, callerNumber: context.callerNumber });

  try {
    const greet = async (): Promise<void> => {
      await delay(options.greetingDelayMs ?? 1000);
      await session.generateReply(GREETING_INSTRUCTION);
    };

    // Both must settle before teardown, so a late greeting never hits a cleared call
    const results = await Promise.allSettled([session.start({ instructions, tools }), greet()]);
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) throw failure.reason;
  } catch (error: unknown) {
    logger.error('Call session failed', {
      callSid: context.callSid,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    const durationSeconds = clock().diff(context.startedAt).as('seconds');
    const transcript = formatTranscript(session.history());

    const collected = Object.keys(context.state.snapshot());

    await callLogger.summarizeAndLog(transcript, durationSeconds, context.state.contact());
    context.state.clear();

    logger.info('Call session ended', { callSid: context.callSid, durationSeconds, collected });
  }
}
