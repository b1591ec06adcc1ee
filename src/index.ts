#!/usr/bin/env node
import { program } from "commander";
import { ask } from "./commands/ask";
import { chat } from "./commands/chat";
import { demo } from "./commands/demo";
import { serve } from "./commands/serve";
import { doctor } from "./commands/utility/doctor";
import { packageVersion } from "./lib/utils/version";

program.name("consulta").version(packageVersion());

program.addCommand(ask, { isDefault: true });
program.addCommand(chat);
program.addCommand(serve);
program.addCommand(demo);
program.addCommand(doctor);

program.parse();
