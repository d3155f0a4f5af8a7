/**
 * Titlekeeper — src/lib/cmdWrap.ts
 * WHAT: Interaction lifecycle helpers for slash commands: tracing, step logging,
 *       Sentry breadcrumbs, safe defers/replies and the error reply.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply with trace id
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction response rules (3‑second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { randomBytes } from "node:crypto";
import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { logger } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "./errors.js";

/**
 * A "phase" is just a label for where we are in command execution:
 * "it crashed in phase 'reserve'" beats "it crashed somewhere in /schedule".
 */
type Phase = string;

export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  /** Mark the current execution phase (e.g., "validate", "reserve", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  /** Record the store operation about to run, for error diagnostics */
  setLastOp: (op: string | null) => void;
  getTraceId: () => string;
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/**
 * 11-char base62 trace ID (~65 bits). Short enough for a Discord reply.
 */
export function newTraceId(): string {
  const length = 11;
  const bytes = randomBytes(length);
  let out = "";
  // modulo bias is fine for trace ids
  for (const byte of bytes) {
    out += BASE62[byte % BASE62.length];
  }
  return out;
}

function discordCode(err: unknown): number | undefined {
  const classified = classifyError(err);
  return classified.kind === "discord_api" ? classified.code : undefined;
}

export function wrapCommand(name: string, fn: CommandExecutor) {
  /**
   * wrapCommand
   * WHAT: Decorates a command handler with tracing, step logging, and the error reply.
   * RETURNS: An interaction handler that never rejects.
   */
  return async (interaction: ChatInputCommandInteraction): Promise<void> => {
    const traceId = newTraceId();
    const startedAt = Date.now();
    let phase: Phase = "enter";
    let lastOp: string | null = null;

    const commandCtx: CommandContext = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
        addBreadcrumb({ category: "cmd", message: name, data: { phase, traceId }, level: "info" });
        setTag("phase", phase);
      },
      currentPhase: () => phase,
      setLastOp: (op: string | null) => {
        lastOp = op;
      },
      getTraceId: () => traceId,
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: name,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "[cmd] command start"
    );

    setTag("cmd", name);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "[cmd] command ok");
    } catch (error) {
      const classified = classifyError(error);
      logger.warn(
        { evt: "cmd_error", traceId, cmd: name, phase, lastOp, ...errorContext(classified), err: error },
        `[cmd] command error: ${classified.message}`
      );
      setTag("errorKind", classified.kind);

      // Only report to Sentry if it's worth tracking (filter noise)
      if (shouldReportToSentry(classified)) {
        captureException(error, { cmd: name, phase, traceId, lastOp, errorKind: classified.kind });
      }

      try {
        await replyOrEdit(interaction, {
          content: `${userFriendlyMessage(classified)}\nTrace: \`${traceId}\``,
        });
      } catch (replyErr) {
        logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "[cmd] failed to post error reply");
      }
    }
  };
}

export async function withStep<T>(
  ctx: CommandContext,
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * First acknowledgement with deferReply. 10062 (expired) is logged and swallowed.
 */
export async function ensureDeferred(
  interaction: ChatInputCommandInteraction,
  ephemeral = true
): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
  } catch (err) {
    const code = discordCode(err);
    if (code === 10062) {
      logger.warn({ evt: "cmd_defer_fail", code, err }, "[cmd] defer failed (interaction expired)");
      return;
    }
    logger.warn({ evt: "cmd_defer_fail", code, err }, "[cmd] defer failed");
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state. Ephemeral unless the
 * payload sets its own flags; public responses should be explicit.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = discordCode(err);
    if (code === 10062 || code === 40060) {
      logger.warn({ evt: "cmd_reply_fail", code, err }, "[cmd] reply skipped; interaction expired or acknowledged");
      return;
    }
    logger.error({ evt: "cmd_reply_fail", code, err }, "[cmd] reply/edit failed");
    throw err;
  }
}
