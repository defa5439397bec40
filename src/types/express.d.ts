import { IdentitySource } from "./identity";

declare global {
  namespace Express {
    interface User {
      id: number;
      source: IdentitySource;
    }

    interface Request {
      user?: User;
      authToken?: string;
    }
  }
}

// Ensure this file is treated as a module
export {};
