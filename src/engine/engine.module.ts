import { Module } from '@nestjs/common';
import { EngineConfigService } from './engine-config.service.js';
import { QuestTrackerService } from './quests/quest-tracker.service.js';
import { EffectApplierService } from './effects/effect-applier.service.js';
import { WorldFactoryService } from './world/world-factory.service.js';
import { SessionRegistryService } from './world/session-registry.service.js';
import { CommandParserService } from './input/command-parser.service.js';
import { DirectCommandService } from './input/direct-command.service.js';

const providers = [
  // configuration
  EngineConfigService,
  // state
  QuestTrackerService,
  EffectApplierService,
  WorldFactoryService,
  SessionRegistryService,
  // input
  CommandParserService,
  DirectCommandService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
