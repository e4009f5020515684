import "dotenv/config";
import { startServer } from "./app.js";

async function main() {
  await startServer();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
