import path from 'node:path';
import { PRIMARY_TOOL } from '../config/settings.js';
import { filesExist, findBuild, findOnPath, findPython, hasPythonModule, loadLibraryFunction } from './probes.js';
import type { FileBasedTool, InProcessTool, MultiStepDirTool, ProbeContext, SubprocessTool, ToolDescriptor, ToolHandle } from './types.js';

async function pythonModuleHandle(probe: ProbeContext, moduleName: string): Promise<ToolHandle | null> {
  const python = await findPython(probe);
  if (!python || !(await hasPythonModule(probe, python, moduleName))) {
    return null;
  }
  return { kind: 'executable', command: python, prefixArgs: ['-m', moduleName] };
}

async function pathHandle(probe: ProbeContext, command: string): Promise<ToolHandle | null> {
  const resolved = await findOnPath(command, probe.env);
  return resolved ? { kind: 'executable', command: resolved, prefixArgs: [] } : null;
}

export const rst2htmlFast: SubprocessTool = {
  name: PRIMARY_TOOL,
  language: 'Rust',
  kind: 'subprocess',
  installHint: 'cargo build --release',
  input: 'full',
  args: [],
  locate: probe => findBuild(probe.projectRoot, 'rst2html'),
};

export const docutils: SubprocessTool = {
  name: 'docutils',
  language: 'Python',
  kind: 'subprocess',
  installHint: 'pip install docutils',
  input: 'full',
  // docutils' front end reads stdin and writes HTML when given no source.
  args: [],
  locate: probe => pythonModuleHandle(probe, 'docutils'),
};

export const pandoc: SubprocessTool = {
  name: 'Pandoc',
  language: 'Haskell',
  kind: 'subprocess',
  installHint: 'brew install pandoc',
  input: 'full',
  args: ['-f', 'rst', '-t', 'html'],
  locate: probe => pathHandle(probe, 'pandoc'),
};

export const sphinx: MultiStepDirTool = {
  name: 'Sphinx',
  language: 'Python',
  kind: 'multi-step-dir',
  installHint: 'pip install sphinx',
  input: 'full',
  configFile: { name: 'conf.py', contents: "project = 'bench'\nextensions = []\n" },
  sourceFileName: 'index.rst',
  args: (sourceDir, outputDir) => ['-b', 'html', '-q', sourceDir, outputDir],
  locate: probe => pythonModuleHandle(probe, 'sphinx'),
};

export const nimRst2html: FileBasedTool = {
  name: 'Nim rst2html',
  language: 'Nim',
  kind: 'file-based',
  installHint: 'brew install nim',
  input: 'simplified',
  footnote: 'Nim rst2html uses simplified input (no grid tables, admonitions, or topic/sidebar directives).',
  inputFileName: 'input.rst',
  // Writes input.html next to the input file.
  args: inputPath => ['rst2html', '--hints:off', inputPath],
  locate: probe => pathHandle(probe, 'nim'),
};

export const gregwarRst: FileBasedTool = {
  name: 'Gregwar/RST',
  language: 'PHP',
  kind: 'file-based',
  installHint: 'cd benchmarks && composer require gregwar/rst',
  input: 'simplified',
  footnote: 'Gregwar/RST uses simplified input (roles/directives stripped) due to limited RST support.',
  inputFileName: 'input.rst',
  args: inputPath => [inputPath],
  async locate(probe) {
    const php = await findOnPath('php', probe.env);
    if (!php) return null;

    const autoloader = path.join(probe.vendorDir, 'autoload.php');
    const driver = path.join(probe.driversDir, 'gregwar.php');
    if (!(await filesExist([autoloader, driver]))) return null;

    return { kind: 'executable', command: php, prefixArgs: [driver, autoloader] };
  },
};

export const restructured: InProcessTool = {
  name: 'restructured',
  language: 'JavaScript',
  kind: 'in-process',
  installHint: 'npm install restructured',
  input: 'full',
  footnote: 'restructured is timed parsing into a document tree; it has no HTML writer.',
  async locate(probe) {
    const convert = await loadLibraryFunction(probe, 'restructured', 'parse');
    return convert ? { kind: 'library', module: 'restructured', convert } : null;
  },
};

export const DEFAULT_TOOLS: readonly ToolDescriptor[] = [
  rst2htmlFast,
  docutils,
  pandoc,
  sphinx,
  nimRst2html,
  gregwarRst,
  restructured,
];
