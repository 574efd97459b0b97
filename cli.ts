import { runCli } from "./services/cliRunner";

runCli(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  error => {
    console.error(error);
    process.exitCode = 1;
  }
);
