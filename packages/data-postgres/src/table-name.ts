export const DEFAULT_TEMPLATE_TABLE = "sensor_templates";

const tableNamePattern = /^[a-zA-Z0-9_]+$/;

export const validateTableName = (name: string): string => {
  if (!tableNamePattern.test(name)) {
    throw new Error(
      `Invalid Postgres table name '${name}'. Only alphanumeric characters and underscores are allowed.`,
    );
  }
  return name;
};
