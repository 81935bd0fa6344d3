import { runCli } from "../lib/cli";

async function main() {
  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
