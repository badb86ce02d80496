import { promises as fs } from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import type { ExportFormat } from '../lib/pipeline';
import { transformAup2, transformJson } from '../lib/pipeline';
import { OptionRangeError } from '../lib/errors';
import type { TransformOptionsInput } from '../lib/options';

const INTEGER_ARG = /^-?\d+$/;

export const USAGE = `Usage: aup2-layer <input.aup2|input.json> <output> [options]

Options:
  --scene <id>        only touch objects of this scene (default: all scenes)
  --layer <n>         target layer (default: 0)
  --keep-layers       leave layers as they are
  --adjust-frames     pack each layer's objects end to end
  --isolate-scenes    pack each scene on its own (implies --adjust-frames)
  --txt               write a plain-text dump instead of .aup2
  --json              write the model as JSON instead of .aup2
  --keep-ids          keep object ids instead of renumbering them
  --quiet             only print warnings and errors
  -h, --help          show this message`;

function formatLayers(dist: Record<number, number>): string {
  const parts = Object.entries(dist).map(([layer, count]) => `${layer}:${count}`);
  return parts.length ? parts.join(' ') : '(none)';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Range checks stay with the options schema; this only refuses text that is not a plain integer.
function intArg(option: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (!INTEGER_ARG.test(raw)) throw new OptionRangeError(option, `must be an integer, got "${raw}"`);
  return Number(raw);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      scene: { type: 'string' },
      layer: { type: 'string' },
      'keep-layers': { type: 'boolean' },
      'adjust-frames': { type: 'boolean' },
      'isolate-scenes': { type: 'boolean' },
      txt: { type: 'boolean' },
      json: { type: 'boolean' },
      'keep-ids': { type: 'boolean' },
      quiet: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** Runs one conversion; resolves to the process exit code. */
export async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    console.error(`error: ${errorMessage(err)}`);
    console.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (positionals.length !== 2 || (values.txt && values.json)) {
    console.error(USAGE);
    return 2;
  }

  const [input, output] = positionals;
  const say = (msg: string) => {
    if (!values.quiet) console.log(msg);
  };

  const format: ExportFormat = values.txt ? 'txt' : values.json ? 'json' : 'aup2';

  try {
    const layer = intArg('targetLayer', values.layer);
    const options: TransformOptionsInput = {
      targetLayer: values['keep-layers'] ? null : layer ?? 0,
      sceneId: intArg('sceneId', values.scene) ?? null,
      adjustFrames: values['adjust-frames'] ?? false,
      isolateScenes: values['isolate-scenes'] ?? false,
      renumberObjects: !values['keep-ids'],
    };

    const ext = path.extname(input).toLowerCase();
    if (ext !== '.aup2' && ext !== '.json') {
      throw new Error(`Input must be an .aup2 or .json file: ${input}`);
    }

    const text = await fs.readFile(input, 'utf8');
    const result = ext === '.json' ? transformJson(text, options, { format }) : transformAup2(text, options, { format });
    for (const w of result.warnings) console.warn(`warning: ${w}`);

    await fs.mkdir(path.dirname(path.resolve(output)), { recursive: true });
    await fs.writeFile(output, result.output, 'utf8');

    const { stats } = result;
    const scope = result.options.sceneId === null ? 'all scenes' : `scene ${result.options.sceneId}`;
    if (result.options.targetLayer !== null) {
      say(`Moved ${stats.matched} object(s) in ${scope} to layer ${result.options.targetLayer}.`);
    }
    if (result.options.adjustFrames || result.options.isolateScenes) {
      say(`Compacted ${stats.compactedGroups} group(s), ${stats.movedObjects} object(s) moved.`);
    }
    say(`Layers: ${formatLayers(stats.before.layerDistribution)} -> ${formatLayers(stats.after.layerDistribution)}`);
    say(`Saved ${format} to ${output}`);
    return 0;
  } catch (err) {
    console.error(`error: ${errorMessage(err)}`);
    return 1;
  }
}
