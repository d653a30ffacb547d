import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { TurnEngineModule } from '../engine/turn/turn-engine.module.js';
import { TurnsController } from './turns.controller.js';
import { TurnsService } from './turns.service.js';

@Module({
  imports: [EngineModule, TurnEngineModule],
  controllers: [TurnsController],
  providers: [TurnsService],
  exports: [TurnsService],
})
export class TurnsModule {}
