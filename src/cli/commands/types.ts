export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const consoleIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export interface CommandContext {
  /** Arguments after the command name */
  args: string[];
  io: CliIO;
  env: NodeJS.ProcessEnv;
  cwd: string;
}
