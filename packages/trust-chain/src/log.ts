import { createLogger } from "@trustwalk/shared";

export const log = createLogger("trust-chain");
