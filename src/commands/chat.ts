import * as readline from "node:readline";
import { Command } from "commander";
import { createDispatcher } from "../lib/dispatch/dispatcher";
import { style } from "../lib/utils/ansi";
import { gracefulExit } from "../lib/utils/exit";

export const EXIT_WORDS = new Set(["salir", "exit", "quit"]);

export const chat = new Command("chat")
  .description("Interactive question loop (type 'salir' to leave)")
  .action(async () => {
    const dispatcher = createDispatcher();
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    console.log(style.bold("consulta"), style.dim("— escribe 'salir' para terminar"));

    try {
      for await (const line of rl) {
        const question = line.trim();
        if (EXIT_WORDS.has(question.toLowerCase())) break;
        if (!question) continue;
        console.log(`${style.cyan("→")} ${await dispatcher.answer(question)}\n`);
      }
    } finally {
      rl.close();
    }

    console.log("¡Hasta luego!");
    await gracefulExit();
  });
