import { createMetricsRegistry } from "@trustwalk/shared";

export const metrics = createMetricsRegistry({ component: "trust-chain" });
