export const DB_QUEUE = "DB_QUEUE";
