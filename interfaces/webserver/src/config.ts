import { z } from "@operator/utils";

const BIND_ADDRESS = /^(?:\[([^\]]+)\]|([^:[\]]+)):(\d{1,5})$/;

export interface BindAddress {
  hostname: string;
  port: number;
}

/**
 * Split `host:port` (or `[ipv6]:port`) into its parts
 */
export function parseBindAddress(bindTo: string): BindAddress | undefined {
  const match = BIND_ADDRESS.exec(bindTo);
  const hostname = match?.[1] ?? match?.[2];
  const port = Number(match?.[3]);
  if (hostname === undefined || !Number.isInteger(port) || port > 65535) {
    return undefined;
  }
  return { hostname, port };
}

/**
 * Webserver configuration schema
 */
export const webserverConfigSchema = z.object({
  bindTo: z
    .string()
    .refine((value) => parseBindAddress(value) !== undefined, {
      message: "Expected host:port",
    })
    .describe("Socket address to listen on")
    .default("127.0.0.1:8080"),
});

export type WebserverConfig = z.infer<typeof webserverConfigSchema>;
