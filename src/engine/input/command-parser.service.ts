// Free-text command → direct game intent, or NARRATIVE for the model

import { Injectable } from '@nestjs/common';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import { normalizeName } from '../../common/text-utils.js';

export type ReadCommandType = 'LOOK' | 'INVENTORY' | 'JOURNAL' | 'HELP' | 'SAVE';
export type TargetCommandType = 'MOVE' | 'ACCEPT' | 'DECLINE' | 'ABANDON' | 'ATTACK' | 'TRADE';

export type ParsedCommand =
  | { type: ReadCommandType }
  | { type: TargetCommandType; target: string }
  | { type: 'NARRATIVE'; text: string };

interface VerbEntry {
  words: string[];
  type: ReadCommandType;
  /** trailing words that still count as the bare command */
  allowedRest?: string[];
}

interface TargetVerbEntry {
  words: string[];
  type: TargetCommandType;
}

const BARE_VERBS: VerbEntry[] = [
  { words: ['look', 'l'], type: 'LOOK', allowedRest: ['around'] },
  { words: ['inventory', 'inv', 'i'], type: 'INVENTORY' },
  { words: ['journal', 'quests', 'quest log', 'log'], type: 'JOURNAL' },
  { words: ['help', '?'], type: 'HELP' },
  { words: ['save', 'save game'], type: 'SAVE' },
];

const TARGET_VERBS: TargetVerbEntry[] = [
  { words: ['go', 'move', 'walk', 'travel', 'head'], type: 'MOVE' },
  { words: ['accept'], type: 'ACCEPT' },
  { words: ['decline', 'refuse'], type: 'DECLINE' },
  { words: ['abandon', 'drop quest'], type: 'ABANDON' },
  { words: ['attack', 'fight', 'strike'], type: 'ATTACK' },
  { words: ['trade', 'barter'], type: 'TRADE' },
];

const FILLER = new Set(['to', 'the', 'towards', 'into', 'quest', 'a', 'with']);

@Injectable()
export class CommandParserService {
  parse(input: string): ParsedCommand {
    const text = input.trim();
    if (!text) {
      throw new InvalidInputError('Command must not be empty');
    }
    const lowered = text.toLowerCase().replace(/\s+/g, ' ');

    for (const verb of BARE_VERBS) {
      for (const word of verb.words) {
        if (lowered === word) return { type: verb.type };
        const rest = this.restAfter(lowered, word);
        if (rest !== null && verb.allowedRest?.includes(rest)) return { type: verb.type };
      }
    }

    for (const verb of TARGET_VERBS) {
      for (const word of verb.words) {
        const rest = this.restAfter(lowered, word);
        if (rest === null) continue;
        const target = this.stripFiller(rest);
        if (target) return { type: verb.type, target };
      }
    }

    return { type: 'NARRATIVE', text };
  }

  private restAfter(lowered: string, word: string): string | null {
    if (!lowered.startsWith(`${word} `)) return null;
    return lowered.slice(word.length + 1).trim();
  }

  private stripFiller(rest: string): string {
    const words = normalizeName(rest).split(' ').filter(Boolean);
    while (words.length > 0 && FILLER.has(words[0])) words.shift();
    return words.join(' ');
  }
}
