import { CommandParserService } from './command-parser.service.js';
import { InvalidInputError } from '../../common/errors/game-errors.js';

describe('CommandParserService', () => {
  let parser: CommandParserService;

  beforeEach(() => {
    parser = new CommandParserService();
  });

  describe('bare commands', () => {
    it.each([
      ['look', 'LOOK'],
      ['Look around', 'LOOK'],
      ['i', 'INVENTORY'],
      ['INVENTORY', 'INVENTORY'],
      ['quests', 'JOURNAL'],
      ['quest log', 'JOURNAL'],
      ['help', 'HELP'],
      ['save', 'SAVE'],
    ])('"%s" → %s', (input, type) => {
      expect(parser.parse(input)).toEqual({ type });
    });
  });

  describe('commands with a target', () => {
    it('strips filler words from a move target', () => {
      expect(parser.parse('go to the forge')).toEqual({ type: 'MOVE', target: 'forge' });
    });

    it('normalizes punctuation in the target', () => {
      expect(parser.parse("walk to Brannoc's Forge")).toEqual({ type: 'MOVE', target: 'brannoc s forge' });
    });

    it('parses quest verbs', () => {
      expect(parser.parse('accept the quest lost_sword')).toEqual({ type: 'ACCEPT', target: 'lost sword' });
      expect(parser.parse('decline rats')).toEqual({ type: 'DECLINE', target: 'rats' });
      expect(parser.parse('abandon rats')).toEqual({ type: 'ABANDON', target: 'rats' });
    });

    it('parses attack and trade targets', () => {
      expect(parser.parse('attack the goblin')).toEqual({ type: 'ATTACK', target: 'goblin' });
      expect(parser.parse('Trade with Brannoc')).toEqual({ type: 'TRADE', target: 'brannoc' });
    });
  });

  describe('narrative fallthrough', () => {
    it('keeps free text as it was typed', () => {
      expect(parser.parse('  give the sword to the blacksmith ')).toEqual({
        type: 'NARRATIVE',
        text: 'give the sword to the blacksmith',
      });
    });

    it('treats "look at" as narrative', () => {
      expect(parser.parse('look at the smith')).toEqual({ type: 'NARRATIVE', text: 'look at the smith' });
    });

    it('treats a move without a destination as narrative', () => {
      expect(parser.parse('go to the')).toEqual({ type: 'NARRATIVE', text: 'go to the' });
    });
  });

  it('rejects blank input', () => {
    expect(() => parser.parse('   ')).toThrow(InvalidInputError);
  });
});
