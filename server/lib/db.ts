import postgres from "postgres";
import type { DatabaseConfig, SslMode } from "./config";

export interface ConnectionDetails {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string | undefined;
  sslMode: SslMode;
}

export function toConnectionDetails(config: DatabaseConfig): ConnectionDetails {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    username: config.username,
    password: config.password,
    sslMode: config.ssl_mode,
  };
}

export function createClient(details: ConnectionDetails) {
  return postgres({
    host: details.host,
    port: details.port,
    database: details.database,
    username: details.username,
    password: details.password,
    ssl: details.sslMode === "disable" ? false : details.sslMode,
    connect_timeout: 10,
    max: 1,
    onnotice: () => {},
    connection: {
      application_name: "sql-completer",
    },
  });
}

export type SqlClient = ReturnType<typeof createClient>;
