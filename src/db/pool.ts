import postgres from 'postgres';

export function createSql(databaseUrl: string) {
  return postgres(databaseUrl, {
    max: 2,
    idle_timeout: 10,
    connect_timeout: 10,
    onnotice: () => {},
  });
}
