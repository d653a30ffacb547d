// Turn Orchestrator: one player command, start to finish
//
//   Idle → Building → Calling → Validating → Applying → Idle
//
// A rejected reply is retried with a corrective addendum, a gateway failure
// with the same prompt. After LLM_MAX_RETRIES extra attempts the turn ends
// with canned narration and the state untouched.

import { Injectable, Logger } from '@nestjs/common';
import type { AppliedEffect, ClampNote, GameStatus, TurnOutcome, TurnPhase } from '../../db/types/index.js';
import { GatewayError, ProposalRejectedError } from '../../common/errors/game-errors.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { LlmConfigService } from '../../llm/llm-config.service.js';
import { PromptBuilderService } from '../../llm/prompts/prompt-builder.service.js';
import { AiGatewayService } from '../../llm/ai-gateway.service.js';
import { ResponseValidatorService } from '../../llm/response/response-validator.service.js';
import { EFFECT_SCHEMA_HINT, buildCorrectiveAddendum } from '../../llm/prompts/system-prompts.js';
import { SaveService } from '../../persistence/save.service.js';
import { EngineConfigService } from '../engine-config.service.js';
import { EffectApplierService } from '../effects/effect-applier.service.js';
import { CommandParserService, type ParsedCommand } from '../input/command-parser.service.js';
import { DirectCommandService } from '../input/direct-command.service.js';
import type { GameSession } from '../world/session-registry.service.js';

export interface TurnResult {
  sessionId: string;
  version: number;
  status: GameStatus;
  narration: string;
  appliedEffects: AppliedEffect[];
  outcome: TurnOutcome;
  /** every phase the turn passed through, in order */
  phases: TurnPhase[];
  /** model calls made; 0 for commands the engine answered itself */
  attempts: number;
  notices: string[];
}

export interface CancelResult {
  cancelled: number;
  version: number;
}

type DirectCommand = Exclude<ParsedCommand, { type: 'NARRATIVE' }>;

interface TurnDraft {
  session: GameSession;
  phases: TurnPhase[];
  attempts: number;
  notices: string[];
}

function clampNotice(note: ClampNote): string {
  return `Effect #${note.index} ${note.field} clamped from ${note.proposed} to ${note.clampedTo}`;
}

@Injectable()
export class TurnOrchestratorService {
  private readonly logger = new Logger(TurnOrchestratorService.name);

  constructor(
    private readonly engineConfig: EngineConfigService,
    private readonly llmConfig: LlmConfigService,
    private readonly content: ContentLoaderService,
    private readonly parser: CommandParserService,
    private readonly direct: DirectCommandService,
    private readonly promptBuilder: PromptBuilderService,
    private readonly gateway: AiGatewayService,
    private readonly validator: ResponseValidatorService,
    private readonly applier: EffectApplierService,
    private readonly saves: SaveService,
  ) {}

  /**
   * Runs one command against the session. Blank input is refused before the
   * command waits for the session's turn gate.
   */
  async submit(session: GameSession, text: string): Promise<TurnResult> {
    const command = this.parser.parse(text);
    return session.gate.run(
      () => this.runTurn(session, command, text.trim()),
      this.engineConfig.get().turnConcurrency,
    );
  }

  /** Drops queued commands and waits for the one in flight. */
  async cancel(session: GameSession): Promise<CancelResult> {
    const cancelled = await session.gate.cancelPending();
    if (cancelled > 0) {
      this.logger.log(`Cancelled ${cancelled} queued turn(s) in ${session.sessionId}`);
    }
    return { cancelled, version: session.store.version };
  }

  private async runTurn(session: GameSession, command: ParsedCommand, text: string): Promise<TurnResult> {
    const draft: TurnDraft = { session, phases: ['Idle'], attempts: 0, notices: [] };
    const status = session.store.read().world.status;

    if (status !== 'PLAYING') {
      const narration = this.content.getNarration();
      return this.finish(draft, 'REJECTED', status === 'VICTORY' ? narration.victory : narration.gameOver);
    }
    if (command.type === 'NARRATIVE') {
      return this.runNarrative(draft, text);
    }
    return this.runDirect(draft, command);
  }

  private async runNarrative(draft: TurnDraft, text: string): Promise<TurnResult> {
    const { session } = draft;
    const maxAttempts = this.llmConfig.get().maxRetries + 1;
    let addendum: string | undefined;

    while (draft.attempts < maxAttempts) {
      draft.attempts += 1;
      const state = session.store.read();

      try {
        draft.phases.push('Building');
        const payload = this.promptBuilder.build({ state, command: text, addendum });
        if (!payload.withinBudget) {
          this.logger.warn(`Prompt for ${session.sessionId} is ${payload.charCount} chars, over budget after dropping`);
        }

        draft.phases.push('Calling');
        const raw = await this.gateway.generate(payload, EFFECT_SCHEMA_HINT, {
          sessionId: session.sessionId,
          worldVersion: state.world.version,
          attempt: draft.attempts,
        });

        draft.phases.push('Validating');
        const proposal = this.validator.validate(raw, state);

        draft.phases.push('Applying');
        const applied = this.applier.apply(session.store, proposal, { playerUtterance: text });
        draft.notices.push(...proposal.clamped.map(clampNotice));
        return this.finish(draft, 'APPLIED', applied.narration, applied.appliedEffects);
      } catch (err) {
        if (err instanceof GatewayError) {
          this.logger.warn(`Attempt ${draft.attempts}/${maxAttempts} failed: ${err.kind} (${err.message})`);
          continue;
        }
        if (err instanceof ProposalRejectedError) {
          this.logger.warn(`Attempt ${draft.attempts}/${maxAttempts} rejected: ${err.code} (${err.message})`);
          addendum = buildCorrectiveAddendum({ code: err.code, message: err.message });
          continue;
        }
        this.logger.error(
          `Turn in ${session.sessionId} aborted: ${err instanceof Error ? err.message : String(err)}`,
          err instanceof Error ? err.stack : undefined,
        );
        break;
      }
    }

    this.logger.warn(`Fallback narration for ${session.sessionId} after ${draft.attempts} attempt(s)`);
    return this.finish(draft, 'FALLBACK', this.content.getNarration().turnFallback);
  }

  private async runDirect(draft: TurnDraft, command: DirectCommand): Promise<TurnResult> {
    const { session } = draft;
    const outcome = this.direct.execute(session.store.read(), command);

    switch (outcome.type) {
      case 'READ':
        return this.finish(draft, 'DIRECT', outcome.narration);
      case 'REJECTED':
        return this.finish(draft, 'REJECTED', outcome.narration);
      case 'SAVE':
        return this.save(draft);
      case 'PROPOSAL': {
        draft.phases.push('Applying');
        try {
          const applied = this.applier.apply(session.store, outcome.proposal);
          return this.finish(draft, 'DIRECT', applied.narration, applied.appliedEffects);
        } catch (err) {
          if (err instanceof ProposalRejectedError) {
            return this.finish(draft, 'REJECTED', err.message);
          }
          throw err;
        }
      }
    }
  }

  /** A failed save is reported, never fatal: the live state stays authoritative. */
  private async save(draft: TurnDraft): Promise<TurnResult> {
    try {
      const summary = await this.saves.save(draft.session);
      return this.finish(draft, 'DIRECT', `Game saved (${summary.saveId}).`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Save of ${draft.session.sessionId} failed: ${message}`);
      draft.notices.push(message);
      return this.finish(draft, 'DIRECT', this.content.getNarration().saveFailed);
    }
  }

  private finish(
    draft: TurnDraft,
    outcome: TurnOutcome,
    narration: string,
    appliedEffects: AppliedEffect[] = [],
  ): TurnResult {
    if (draft.phases[draft.phases.length - 1] !== 'Idle') {
      draft.phases.push('Idle');
    }
    const state = draft.session.store.read();
    return {
      sessionId: draft.session.sessionId,
      version: state.world.version,
      status: state.world.status,
      narration,
      appliedEffects,
      outcome,
      phases: draft.phases,
      attempts: draft.attempts,
      notices: draft.notices,
    };
  }
}
