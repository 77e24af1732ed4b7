export interface CliArgs {
  command: string | undefined;
  positional: string[];
  output: string | undefined;
  verbose: boolean;
}

/**
 * Splits argv (without the node and script entries) into a command, its
 * positional arguments and the known flags. Anything else, including words
 * that start with `--`, is positional; after a bare `--` nothing is a flag.
 */
export const parseCliArgs = (argv: readonly string[]): CliArgs => {
  const [command, ...args] = argv;
  const positional: string[] = [];
  let output: string | undefined;
  let verbose = false;

  for (let index = 0; index < args.length; index += 1) {
    const value = args[index];
    if (value === "--") {
      positional.push(...args.slice(index + 1));
      break;
    }
    if (value === "--verbose") {
      verbose = true;
    } else if (value === "--output" && index + 1 < args.length) {
      output = args[index + 1];
      index += 1;
    } else {
      positional.push(value);
    }
  }

  return { command, positional, output, verbose };
};
