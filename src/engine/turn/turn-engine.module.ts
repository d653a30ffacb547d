import { Module } from '@nestjs/common';
import { EngineModule } from '../engine.module.js';
import { LlmModule } from '../../llm/llm.module.js';
import { PersistenceModule } from '../../persistence/persistence.module.js';
import { TurnOrchestratorService } from './turn-orchestrator.service.js';

@Module({
  imports: [EngineModule, LlmModule, PersistenceModule],
  providers: [TurnOrchestratorService],
  exports: [TurnOrchestratorService],
})
export class TurnEngineModule {}
