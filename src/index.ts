import { runCli } from "@/lib/cli";

const controller = new AbortController();
process.once("SIGINT", () => {
  console.log("\n[sim] stopped by user");
  controller.abort();
});

runCli(process.argv.slice(2), controller.signal)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
