import { join } from 'path';
import { ContentLoaderService } from './content-loader.service.js';
import { ConfigurationError } from '../common/errors/game-errors.js';
import { makeContentBundle } from '../testing/game-state.fixture.js';

const CONTENT_DIR = join(__dirname, '..', '..', 'content', 'world_v1');

describe('ContentLoaderService', () => {
  it('loads the shipped world', async () => {
    const loader = new ContentLoaderService();
    await loader.loadFrom(CONTENT_DIR);

    expect(loader.getLocations().map((l) => l.locationId)).toContain('village_square');
    expect(loader.getNpcTemplate('blacksmith')?.name).toBe('Brannoc');
    expect(loader.getPlayerDefaults().startingLocationId).toBe('village_square');
    expect(loader.getNarration().turnFallback).toMatch(/^The path forward is unclear/);
  });

  it('rejects content with a dangling exit', () => {
    const loader = new ContentLoaderService();
    const bundle = makeContentBundle();
    bundle.locations[0].exits.push('nowhere');

    expect(() => loader.use(bundle)).toThrow(ConfigurationError);
  });

  it('fails with ConfigurationError when the directory is missing', async () => {
    const loader = new ContentLoaderService();

    await expect(loader.loadFrom(join(CONTENT_DIR, 'missing'))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('refuses to hand out narration before anything is loaded', () => {
    expect(() => new ContentLoaderService().getNarration()).toThrow('World content not loaded');
  });
});
