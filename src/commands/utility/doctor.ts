import * as os from "node:os";
import { Command } from "commander";
import { BACKENDS, CONFIG, LLM, PROVISION_SERVICES } from "../../config";
import { BackendClient } from "../../lib/backend/client";
import { DOMAIN_LABEL } from "../../lib/provision/pipeline";
import { ProvisionClient } from "../../lib/provision/remote";
import { DOMAINS } from "../../lib/router/types";
import { describeError } from "../../lib/utils/errors";
import { gracefulExit } from "../../lib/utils/exit";

export const doctor = new Command("doctor")
  .description("Check configuration and backend connectivity")
  .action(async () => {
    console.log("🏥 consulta Doctor\n");

    console.log(`Builder: ${CONFIG.BUILDER} | Delegate: ${CONFIG.DELEGATE}`);
    console.log(`Timeout: ${CONFIG.BACKEND_TIMEOUT_MS} ms`);
    if (CONFIG.BUILDER === "model") {
      console.log(`Model: ${LLM.model} @ ${LLM.endpoint}`);
    }
    console.log("");

    let healthy = true;
    for (const domain of DOMAINS) {
      const label = DOMAIN_LABEL[domain];
      const client = new BackendClient(BACKENDS[domain]);
      try {
        await client.fetchJson({ method: "GET", path: "/stats" });
        console.log(`✅ API ${label}: ${BACKENDS[domain]}`);
      } catch (e) {
        healthy = false;
        console.log(`❌ API ${label}: ${describeError(e)}`);
      }

      try {
        await new ProvisionClient(PROVISION_SERVICES[domain]).manifest();
        console.log(`✅ Provision ${label}: ${PROVISION_SERVICES[domain]}`);
      } catch (e) {
        // Only fatal when questions are delegated.
        if (CONFIG.DELEGATE === "provision") healthy = false;
        console.log(`❌ Provision ${label}: ${describeError(e)}`);
      }
    }

    console.log(
      `\nSystem: ${os.platform()} ${os.arch()} | Node: ${process.version}`,
    );
    if (!healthy) {
      console.log("   Try: consulta demo   (fixture APIs on the default ports)");
    } else {
      console.log("\nIf you see ✅ everywhere, you are ready to ask!");
    }

    await gracefulExit(healthy ? 0 : 1);
  });
