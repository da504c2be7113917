// src/index.ts

// first: the logger reads its settings when it loads
import "dotenv/config";
import { main } from "./app/main";

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`Error in main: ${error}`);
    process.exit(1);
  });
