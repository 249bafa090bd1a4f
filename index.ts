#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { main } from "./src/index.js";

export { main };

// Allow `node dist/index.js` direct execution, also through the npm bin symlink
const invokedPath = process.argv[1] ? fs.realpathSync(process.argv[1]) : null;
if (invokedPath === fileURLToPath(import.meta.url)) {
  void main(process.argv);
}
