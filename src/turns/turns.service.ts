import { Injectable } from '@nestjs/common';
import { SessionRegistryService } from '../engine/world/session-registry.service.js';
import {
  TurnOrchestratorService,
  type CancelResult,
  type TurnResult,
} from '../engine/turn/turn-orchestrator.service.js';

@Injectable()
export class TurnsService {
  constructor(
    private readonly registry: SessionRegistryService,
    private readonly orchestrator: TurnOrchestratorService,
  ) {}

  submitTurn(sessionId: string, playerId: string, text: string): Promise<TurnResult> {
    return this.orchestrator.submit(this.registry.get(sessionId, playerId), text);
  }

  cancel(sessionId: string, playerId: string): Promise<CancelResult> {
    return this.orchestrator.cancel(this.registry.get(sessionId, playerId));
  }
}
