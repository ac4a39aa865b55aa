// ---------------------------------------------------------------------------
// Plant care chat: one ConversationSession driven from the terminal
// ---------------------------------------------------------------------------
// Run with: npm run chat
//
//   /image <path>      attach a photo to the next question
//   /location <place>  set the location used for weather
//   /strategy <name>   fixed_pipeline | dynamic_planner
//   /rate <0-100>      score the last answer
//   exit               quit

import { readFile } from "node:fs/promises";
import * as readline from "node:readline";
import {
  ConversationSession,
  FeedbackError,
  STRATEGIES,
  createPlantCareApp,
  type Strategy,
} from "../index";

const { orchestrator } = await createPlantCareApp();

let strategy: Strategy = orchestrator.config.strategy;
let session = new ConversationSession(orchestrator, { strategy });
let location: string | undefined;
let image: string | undefined;

const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

const ask = () =>
  new Promise<string | null>((resolve) => {
    rl.question("You: ", resolve);
    rl.once("close", () => resolve(null));
  });

function isStrategy(value: string): value is Strategy {
  return STRATEGIES.some((s) => s === value);
}

async function command(line: string): Promise<void> {
  const [cmd = "", ...rest] = line.split(" ");
  const arg = rest.join(" ").trim();
  switch (cmd) {
    case "/image":
      image = (await readFile(arg)).toString("base64");
      console.log(`Attached ${arg}`);
      return;
    case "/location":
      location = arg || undefined;
      console.log(location ? `Location set to ${location}` : "Location cleared");
      return;
    case "/strategy":
      if (!isStrategy(arg)) {
        console.log(`Unknown strategy. Use one of: ${STRATEGIES.join(", ")}`);
        return;
      }
      strategy = arg;
      session = new ConversationSession(orchestrator, { strategy });
      console.log(`Strategy: ${strategy} (new conversation)`);
      return;
    case "/rate": {
      const last = session.history.length - 1;
      try {
        const outcome = await session.feedback(last, Number(arg));
        console.log(outcome.stored ? "Thanks! Saved to the knowledge base." : "Thanks for the feedback.");
      } catch (err) {
        if (!(err instanceof FeedbackError) && !(err instanceof RangeError)) throw err;
        console.log(err.message);
      }
      return;
    }
    default:
      console.log(`Unknown command ${cmd}`);
  }
}

console.log('Ask me about your plants! (type "exit" or press Ctrl+C to quit)\n');

while (true) {
  const line = await ask();
  if (line === null || line.trim().toLowerCase() === "exit") {
    console.log("Goodbye!");
    rl.close();
    break;
  }
  const query = line.trim();
  if (!query) continue;
  if (query.startsWith("/")) {
    await command(query);
    continue;
  }

  const turn = await session.ask({ query, image, location });
  image = undefined;

  console.log(`\nAssistant: ${turn.response}\n`);
  if (turn.provenance?.summary.length) {
    console.log(`Sources: ${turn.provenance.summary.join(" | ")}`);
  }
  if (turn.intent) {
    console.log(`Intent: ${turn.intent} (${turn.completeness?.score.toFixed(2) ?? "n/a"} complete)`);
  }
  console.log();
}
