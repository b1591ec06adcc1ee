import { Command } from "commander";
import ora from "ora";
import { createDispatcher } from "../lib/dispatch/dispatcher";
import { style } from "../lib/utils/ansi";
import { gracefulExit } from "../lib/utils/exit";

export const ask = new Command("ask")
  .description("Answer one question about the library or purchases data")
  .argument("<question...>", "The question, in Spanish")
  .option("--trace", "Show the dispatch states and matched rules", false)
  .action(async (words: string[], _options, cmd) => {
    const options: { trace: boolean } = cmd.optsWithGlobals();
    const question = words.join(" ");
    const dispatcher = createDispatcher();

    const spinner = process.stdout.isTTY
      ? ora({ text: "Procesando..." }).start()
      : null;
    const outcome = await dispatcher.run(question);
    spinner?.stop();

    console.log(outcome.text);
    if (options.trace) {
      console.log(style.dim(`\nestados: ${outcome.trace.join(" → ")}`));
      console.log(style.dim(`dominio: ${outcome.classification}`));
      for (const intent of outcome.intents) {
        console.log(
          style.dim(
            `regla: ${intent.ruleId} ${JSON.stringify(intent.params)}${intent.confident ? "" : " (por defecto)"}`,
          ),
        );
      }
    }

    await gracefulExit(outcome.state === "FAILED" ? 1 : 0);
  });
