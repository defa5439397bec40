export * from "./users.schema";
export * from "./userSessions.schema";
export * from "./refreshToken.schema";
export * from "./tokenBlacklist.schema";
export * from "./schemaVersion.schema";
export * from "./scrapedData.schema";
export * from "./savedScrapers.schema";
