import readline from "node:readline";

/** Reads every line and never answers. Stays alive until signalled. */
const rl = readline.createInterface({
  input: process.stdin,
  crlfDelay: Infinity,
});

rl.on("line", () => {
  // Deliberately silent.
});

setInterval(() => {}, 1000);
