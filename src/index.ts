import {resolve} from "path";
import {buildProgram} from "./cli";
import {reportError, runCommand} from "./commands";
import {loadConfig} from "./config";

const program = buildProgram(async (command, options) => {
  process.exitCode = await runCommand(command, {
    cwd: resolve(options.directory ?? process.cwd()),
    config: loadConfig()
  });
});

program.parseAsync(process.argv).catch((error) => {
  process.exit(reportError(error));
});
