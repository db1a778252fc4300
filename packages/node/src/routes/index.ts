export { createCustodyRoutes } from "./custody.js";
export { createAuctionRoutes } from "./auctions.js";
export { createPaymentRoutes } from "./payments.js";
export { createClaimRoutes } from "./claims.js";
export { createGovernanceRoutes } from "./governance.js";
export { createParameterRoutes } from "./parameters.js";
export { createEventRoutes } from "./events.js";
export { createSandboxRoutes } from "./sandbox.js";
export { createHealthRoutes } from "./health.js";
