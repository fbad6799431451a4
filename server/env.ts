import type { AppContext } from "../app/lib/context";

export type AppEnv = {
  Variables: {
    ctx: AppContext;
  };
};
