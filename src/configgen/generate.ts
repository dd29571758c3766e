import { randomUUID } from 'node:crypto';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { selectToolchain } from '../compiler/detect.ts';
import type { CompilerChoice, DetectionContext, EffectiveCompiler, ToolchainSelection } from '../compiler/types.ts';
import { errorCode } from '../errors.ts';
import type { Logger } from '../logger.ts';
import { formatOneLineError } from '../text.ts';
import { TemplateEditor, type EditOutcome } from './edits.ts';
import { insertExtraSetting, parseExtraSetting } from './extraSettings.ts';
import { renderIntelSections } from './intel.ts';
import { mapTuneValue, TEMPLATE_LINES, TEMPLATE_RELATIVE_PATH, TEMPLATE_REPLACEMENTS } from './template.ts';

export interface GenerateOptions {
  specRoot: string;
  cores?: number;
  tune?: string;
  extraSettings?: readonly string[];
  compiler?: CompilerChoice;
}

export interface GenerateContext extends DetectionContext {
  /** Directory for the generated file; the OS temp dir when unset. */
  tmpDir?: string;
}

export interface GeneratedConfig {
  path: string;
  compiler: EffectiveCompiler;
  edits: EditOutcome[];
  /** Variables the generated config needs at build/run time (oneAPI), empty for GCC. */
  environment: Record<string, string>;
}

export interface RenderedConfig {
  text: string;
  edits: EditOutcome[];
}

const DEFAULT_COPIES = 4;

function applyGccEdits(editor: TemplateEditor, toolchain: ToolchainSelection, log: Logger): void {
  const gcc = toolchain.gcc;

  if (gcc?.version !== undefined && gcc.version >= 10) {
    editor.replaceFirst('gcc-ge10', TEMPLATE_LINES.gccGe10, TEMPLATE_REPLACEMENTS.gccGe10());
  } else {
    editor.skip('gcc-ge10', gcc?.version === undefined ? 'gcc version unknown' : `gcc ${gcc.version} < 10`);
  }

  if (gcc) {
    editor.replaceFirst('gcc-dir', TEMPLATE_LINES.gccDir, TEMPLATE_REPLACEMENTS.gccDir(gcc.root));
  } else {
    log.warn('Could not detect GCC path, using default in template');
    editor.skip('gcc-dir', 'gcc not detected');
  }
}

/**
 * Applies every edit to the template text. Pure apart from logging: detection results
 * and the host CPU count are inputs.
 */
export function renderConfig(
  template: string,
  options: Omit<GenerateOptions, 'specRoot' | 'compiler'>,
  toolchain: ToolchainSelection,
  hostCpuCount: number | undefined,
  log: Logger,
): RenderedConfig {
  const editor = new TemplateEditor(template);

  editor.replaceFirst('label', TEMPLATE_LINES.label, TEMPLATE_REPLACEMENTS.label());
  applyGccEdits(editor, toolchain, log);

  if (options.tune !== undefined) {
    editor.replaceFirst('tune', TEMPLATE_LINES.tune, TEMPLATE_REPLACEMENTS.tune(mapTuneValue(options.tune)));
  }

  const copies = options.cores ?? hostCpuCount ?? DEFAULT_COPIES;
  editor.replaceFirst('copies', TEMPLATE_LINES.copies, TEMPLATE_REPLACEMENTS.copies(copies));

  if (toolchain.effective === 'intel' && toolchain.intel) {
    const intel = toolchain.intel;
    editor.update('intel-sections', (text) => `${text.endsWith('\n') ? text : `${text}\n`}\n${renderIntelSections(intel)}`);
  }

  for (const raw of options.extraSettings ?? []) {
    const setting = parseExtraSetting(raw);
    if (!setting) {
      log.warn({ setting: raw }, 'Ignoring malformed extra setting (expected section:key=value)');
      editor.skip('extra-setting', raw);
      continue;
    }
    editor.update('extra-setting', (text) => insertExtraSetting(text, setting), raw);
  }

  return { text: editor.text, edits: editor.outcomes() };
}

export function templatePath(specRoot: string): string {
  return join(specRoot, TEMPLATE_RELATIVE_PATH);
}

async function readTemplate(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return undefined;
    throw err;
  }
}

/**
 * Writes a fresh `.cfg` derived from the vendor template. Returns `undefined` when the
 * template is missing or anything else goes wrong; the caller reports that.
 */
export async function generateConfig(options: GenerateOptions, ctx: GenerateContext): Promise<GeneratedConfig | undefined> {
  const { log } = ctx;
  try {
    const source = templatePath(options.specRoot);
    const template = await readTemplate(source);
    if (template === undefined) {
      log.error({ template: source }, 'Config template not found');
      return undefined;
    }

    const toolchain = selectToolchain(options.compiler, ctx);
    const rendered = renderConfig(template, options, toolchain, ctx.probe.cpuCount(), log);
    for (const edit of rendered.edits) {
      if (edit.status !== 'applied') log.debug({ ...edit }, 'Template edit did not apply');
    }

    const path = join(ctx.tmpDir ?? tmpdir(), `specer_generated_${randomUUID()}.cfg`);
    await writeFile(path, rendered.text, { encoding: 'utf8', flag: 'wx' });
    log.debug({ path, compiler: toolchain.effective }, 'Generated config');

    return {
      path,
      compiler: toolchain.effective,
      edits: rendered.edits,
      environment: toolchain.intel?.environment ?? {},
    };
  } catch (err) {
    log.error({ err: formatOneLineError(err, 512) }, 'Config generation failed');
    return undefined;
  }
}

/** Best effort: a file that is already gone is not an error. */
export async function removeGeneratedConfig(path: string, log: Logger): Promise<void> {
  await rm(path, { force: true }).catch((err: unknown) => {
    log.debug({ path, err: formatOneLineError(err, 256) }, 'Could not remove generated config');
  });
}
