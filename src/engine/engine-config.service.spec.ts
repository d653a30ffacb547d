import { ConfigurationError } from '../common/errors/game-errors.js';
import { EngineConfigService, parseEngineConfig } from './engine-config.service.js';

describe('parseEngineConfig', () => {
  it('falls back to the defaults', () => {
    expect(parseEngineConfig({})).toEqual({
      memoryCapacity: 12,
      promptDialogueTurns: 6,
      promptBudgetChars: 6000,
      dispositionMin: -100,
      dispositionMax: 100,
      maxDispositionDelta: 25,
      maxStatDelta: 20,
      statCap: 999,
      turnConcurrency: 'queue',
      difficultyInterval: 3,
      tradePrice: 5,
      tradeHeal: 20,
    });
  });

  it('reads numbers and the concurrency policy from strings', () => {
    const config = parseEngineConfig({ NPC_MEMORY_CAPACITY: '8', PROMPT_DIALOGUE_TURNS: '3', TURN_CONCURRENCY: 'reject' });
    expect(config).toMatchObject({ memoryCapacity: 8, promptDialogueTurns: 3, turnConcurrency: 'reject' });
  });

  it('requires the prompt window to be smaller than the memory', () => {
    expect(() => parseEngineConfig({ NPC_MEMORY_CAPACITY: '4', PROMPT_DIALOGUE_TURNS: '4' })).toThrow(ConfigurationError);
  });

  it('lets the difficulty pass be switched off', () => {
    expect(parseEngineConfig({ DIFFICULTY_INTERVAL: '0' }).difficultyInterval).toBe(0);
    expect(() => parseEngineConfig({ TRADE_HEAL: '0' })).toThrow(ConfigurationError);
  });

  it('rejects an unknown concurrency policy', () => {
    expect(() => parseEngineConfig({ TURN_CONCURRENCY: 'drop' })).toThrow(ConfigurationError);
  });
});

describe('EngineConfigService.update', () => {
  it('keeps the prompt window below the memory capacity', () => {
    const service = new EngineConfigService();
    service.update({ memoryCapacity: 10, promptDialogueTurns: 4 });

    expect(() => service.update({ promptDialogueTurns: 10 })).toThrow(ConfigurationError);
    expect(service.get().promptDialogueTurns).toBe(4);
  });
});
