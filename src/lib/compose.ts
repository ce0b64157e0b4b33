import yaml from "yaml";
import type {
  DockerComposeConfig,
  DockerComposeService,
  StackConfig,
} from "./types.js";

/** Service keys inside the generated compose file. */
export const DB_SERVICE = "db";
export const ODOO_SERVICE = "odoo";
const NETWORK_KEY = "stack";

/** Port Odoo listens on inside its container. */
export const ODOO_INTERNAL_PORT = 8069;

/**
 * PostgreSQL service configuration
 */
export function getPostgresService(config: StackConfig): DockerComposeService {
  return {
    image: config.dbImage,
    container_name: config.dbContainerName,
    environment: {
      POSTGRES_USER: config.dbUser,
      POSTGRES_PASSWORD: config.dbPassword,
      POSTGRES_DB: "postgres",
    },
    volumes: [`${config.dbDataPath}:/var/lib/postgresql/data`],
    networks: [NETWORK_KEY],
    restart: "always",
  };
}

/**
 * Odoo service configuration. odoo.conf carries the database credentials, so
 * no environment is passed.
 */
export function getOdooService(config: StackConfig): DockerComposeService {
  return {
    image: `odoo:${config.odooVersion}`,
    container_name: config.odooContainerName,
    depends_on: [DB_SERVICE],
    ports: [`${config.odooPort}:${ODOO_INTERNAL_PORT}`],
    volumes: [
      `${config.odooAddonsPath}:/mnt/extra-addons`,
      `${config.odooConfigPath}/odoo.conf:/etc/odoo/odoo.conf`,
    ],
    networks: [NETWORK_KEY],
    restart: "always",
  };
}

export function buildComposeConfig(config: StackConfig): DockerComposeConfig {
  return {
    services: {
      [DB_SERVICE]: getPostgresService(config),
      [ODOO_SERVICE]: getOdooService(config),
    },
    networks: {
      [NETWORK_KEY]: { name: config.odooNetwork },
    },
  };
}

/**
 * Serialize a compose config the way it is written to disk: quoted string
 * values, no line folding, a blank line between top-level sections.
 */
export function renderComposeFile(compose: DockerComposeConfig): string {
  const content = yaml.stringify(compose, {
    indent: 2,
    lineWidth: 0,
    minContentWidth: 0,
    defaultStringType: "QUOTE_DOUBLE",
    defaultKeyType: "PLAIN",
  });

  return content.replace(/^(networks|volumes):\s*$/gm, "\n$1:");
}
