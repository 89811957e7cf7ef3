import { runInit } from './init';
import { BOLD, RED, NC } from './output';
import { InitContext, createNodeContext } from '../context';
import { InitError, formatError } from '../utils/errors';
import { VERSION } from '../version';

function printHelp(): void {
  console.log('');
  console.log(`  ${BOLD}project-init${NC} v${VERSION}`);
  console.log('');
  console.log('  Usage: project-init');
  console.log('');
  console.log('  Run from the root of a freshly copied template. Prompts for the project');
  console.log('  name, description, Firebase project ID and GitHub username, then rewrites');
  console.log('  the template files, installs dependencies, runs lint, type-check and tests,');
  console.log('  and creates the initial git commit.');
  console.log('');
  console.log('  Environment:');
  console.log('    PROJECT_INIT_CONFIG     Path to project-init.yaml (default: ./project-init.yaml)');
  console.log('');
}

/** Dispatch the command line and resolve to the process exit code */
export async function main(args: string[], createContext: () => InitContext = createNodeContext): Promise<number> {
  const command = args[0];

  switch (command) {
    case undefined:
      try {
        await runInit(createContext());
        return 0;
      } catch (err) {
        console.error(`\n${RED}Error:${NC} ${formatError(err)}\n`);
        return err instanceof InitError ? err.exitCode : 1;
      }

    case '--version':
    case '-v':
      console.log(VERSION);
      return 0;

    case '--help':
    case '-h':
      printHelp();
      return 0;

    default:
      console.error(`Unknown argument: ${command}`);
      console.error('Run "project-init --help" for usage.');
      return 1;
  }
}
