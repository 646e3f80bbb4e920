import mysql, { type PoolOptions } from 'mysql2/promise';
import { env } from '../config/env.js';

const MANAGED_TLS_HOSTS = ['tidbcloud.com', 'psdb.cloud'];

function mysqlConfigFromUrl(rawUrl: string): PoolOptions {
  const url = new URL(rawUrl);
  const host = url.hostname.toLowerCase();
  const enableTls = env.MYSQL_SSL ?? MANAGED_TLS_HOSTS.some((h) => host.endsWith(h));

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 3306,
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: url.pathname.replace(/^\//, ''),
    ssl: enableTls ? { rejectUnauthorized: env.MYSQL_SSL_REJECT_UNAUTHORIZED } : undefined
  };
}

// Articles and keywords carry accented text; month quotas are computed in UTC
export const mysqlPool = mysql.createPool({
  ...mysqlConfigFromUrl(env.MYSQL_URL),
  charset: 'utf8mb4',
  timezone: 'Z',
  connectionLimit: 10,
  waitForConnections: true,
  enableKeepAlive: true
});
