// Engine tuning: all bounds, budgets and capacities come from the environment

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors/game-errors.js';

const EngineEnvSchema = z
  .object({
    NPC_MEMORY_CAPACITY: z.coerce.number().int().min(1).max(200).default(12),
    PROMPT_DIALOGUE_TURNS: z.coerce.number().int().min(0).default(6),
    PROMPT_BUDGET_CHARS: z.coerce.number().int().min(200).default(6000),
    DISPOSITION_MIN: z.coerce.number().int().default(-100),
    DISPOSITION_MAX: z.coerce.number().int().default(100),
    MAX_DISPOSITION_DELTA: z.coerce.number().int().min(1).default(25),
    MAX_STAT_DELTA: z.coerce.number().int().min(1).default(20),
    STAT_CAP: z.coerce.number().int().min(1).default(999),
    TURN_CONCURRENCY: z.enum(['queue', 'reject']).default('queue'),
    DIFFICULTY_INTERVAL: z.coerce.number().int().min(0).default(3),
    TRADE_PRICE: z.coerce.number().int().min(0).default(5),
    TRADE_HEAL: z.coerce.number().int().min(1).default(20),
  })
  .refine((env) => env.PROMPT_DIALOGUE_TURNS < env.NPC_MEMORY_CAPACITY, {
    message: 'PROMPT_DIALOGUE_TURNS must be smaller than NPC_MEMORY_CAPACITY',
    path: ['PROMPT_DIALOGUE_TURNS'],
  })
  .refine((env) => env.DISPOSITION_MIN < 0 && env.DISPOSITION_MAX > 0, {
    message: 'disposition range must span zero',
    path: ['DISPOSITION_MIN'],
  });

export type TurnConcurrencyPolicy = 'queue' | 'reject';

export interface EngineConfig {
  memoryCapacity: number;
  promptDialogueTurns: number;
  promptBudgetChars: number;
  dispositionMin: number;
  dispositionMax: number;
  maxDispositionDelta: number;
  maxStatDelta: number;
  statCap: number;
  turnConcurrency: TurnConcurrencyPolicy;
  /** applied turns between difficulty passes; 0 turns them off */
  difficultyInterval: number;
  /** gold a merchant asks for one healing draught */
  tradePrice: number;
  tradeHeal: number;
}

export function parseEngineConfig(env: Record<string, string | undefined>): EngineConfig {
  const result = EngineEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid engine configuration', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  const e = result.data;
  return {
    memoryCapacity: e.NPC_MEMORY_CAPACITY,
    promptDialogueTurns: e.PROMPT_DIALOGUE_TURNS,
    promptBudgetChars: e.PROMPT_BUDGET_CHARS,
    dispositionMin: e.DISPOSITION_MIN,
    dispositionMax: e.DISPOSITION_MAX,
    maxDispositionDelta: e.MAX_DISPOSITION_DELTA,
    maxStatDelta: e.MAX_STAT_DELTA,
    statCap: e.STAT_CAP,
    turnConcurrency: e.TURN_CONCURRENCY,
    difficultyInterval: e.DIFFICULTY_INTERVAL,
    tradePrice: e.TRADE_PRICE,
    tradeHeal: e.TRADE_HEAL,
  };
}

@Injectable()
export class EngineConfigService {
  private readonly logger = new Logger(EngineConfigService.name);
  private config: EngineConfig;

  constructor() {
    this.config = parseEngineConfig(process.env);
  }

  get(): EngineConfig {
    return this.config;
  }

  /** Applies a partial override; the result must still satisfy the invariants above. */
  update(patch: Partial<EngineConfig>): EngineConfig {
    const next = { ...this.config, ...patch };
    if (next.promptDialogueTurns >= next.memoryCapacity) {
      throw new ConfigurationError('PROMPT_DIALOGUE_TURNS must be smaller than NPC_MEMORY_CAPACITY');
    }
    this.config = next;
    this.logger.log(`Engine config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
