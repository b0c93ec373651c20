export const APP_CONFIG = Symbol("APP_CONFIG");
export const POSTGRES_DATABASE = Symbol("POSTGRES_DATABASE");
export const OWNER_REPOSITORY = Symbol("OWNER_REPOSITORY");
export const ATTEMPT_REPOSITORY = Symbol("ATTEMPT_REPOSITORY");
