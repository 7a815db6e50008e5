/**
 * Best-effort extraction of network addresses from Docker inspection data.
 *
 * Absence of a match is reported as null; callers turn that into a warning
 * and skip whatever depended on the address.
 */

/** The parts of `docker network inspect` output read here */
export interface NetworkInspection {
  Name?: string;
  Containers?: Record<string, { Name?: string; IPv4Address?: string } | undefined>;
}

/** The parts of `docker inspect <container>` output read here */
export interface ContainerInspection {
  Name?: string;
  NetworkSettings?: {
    Networks?: Record<string, { IPAddress?: string } | undefined>;
  };
}

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function isIPv4(value: string): boolean {
  const match = IPV4.exec(value);
  return match !== null && match.slice(1).every((octet) => Number(octet) <= 255);
}

/**
 * Strip a CIDR suffix (`172.18.0.2/16` -> `172.18.0.2`) and validate.
 */
export function normalizeAddress(raw: string | undefined): string | null {
  if (!raw) {
    return null;
  }
  const address = raw.split('/')[0]?.trim() ?? '';
  return isIPv4(address) ? address : null;
}

/**
 * Address of a named container attached to a network.
 */
export function extractNetworkMemberAddress(
  network: NetworkInspection,
  memberName: string,
): string | null {
  for (const member of Object.values(network.Containers ?? {})) {
    if (member?.Name?.replace(/^\//, '') === memberName) {
      return normalizeAddress(member.IPv4Address);
    }
  }
  return null;
}

/**
 * Address of a container on a given network.
 */
export function extractContainerNetworkAddress(
  container: ContainerInspection,
  networkName: string,
): string | null {
  return normalizeAddress(container.NetworkSettings?.Networks?.[networkName]?.IPAddress);
}

/**
 * Names of the networks a container is attached to.
 */
export function listContainerNetworks(container: ContainerInspection): string[] {
  return Object.keys(container.NetworkSettings?.Networks ?? {});
}
