import { addDataPacket, stampPacket } from "../engine/dataPacket.js";
import type { EngineServices } from "../engine/container.js";
import type { Step } from "../engine/contracts.js";
import { HandlerNotFoundError, StepConfigError } from "../errors.js";

export function createFetchStep(services: EngineServices): Step {
  return {
    async execute(payload, context) {
      const config = payload.flowStepConfig;
      if (config.stepType !== "fetch") {
        throw new StepConfigError([`stepType: expected fetch, received ${config.stepType}`]);
      }

      const handler = services.registry.getHandler(config.handler);
      if (!handler?.fetch || handler.stepType !== "fetch") {
        throw new HandlerNotFoundError(config.handler, "fetch");
      }

      const fetched = await handler.fetch({
        payload,
        config,
        gate: context.gate,
        mergeEngineData: context.mergeEngineData,
        log: context.log,
        signal: context.signal
      });
      if (fetched.length === 0) {
        context.log(`Fetch handler ${handler.slug} found no new items.`);
        return [];
      }

      context.log(`Fetch handler ${handler.slug} returned ${fetched.length} item(s).`);
      return fetched
        .map((packet) => stampPacket(packet, payload.flowStepId, "fetch"))
        .reduceRight((data, packet) => addDataPacket(data, packet), payload.data);
    }
  };
}
