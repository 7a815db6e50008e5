import { describe, it, expect } from '@jest/globals';
import {
  extractContainerNetworkAddress,
  extractNetworkMemberAddress,
  isIPv4,
  listContainerNetworks,
  normalizeAddress,
} from '@/lib/address-discovery';

describe('address discovery', () => {
  const kindNetwork = {
    Name: 'kind',
    Containers: {
      abc123: { Name: 'cube-studio-control-plane', IPv4Address: '172.18.0.2/16' },
      def456: { Name: 'docker-mysql-1', IPv4Address: '172.18.0.5/16' },
    },
  };

  describe('extractNetworkMemberAddress', () => {
    it('should return the member address without the prefix length', () => {
      expect(extractNetworkMemberAddress(kindNetwork, 'cube-studio-control-plane')).toBe('172.18.0.2');
    });

    it('should return null for an unknown member', () => {
      expect(extractNetworkMemberAddress(kindNetwork, 'docker-redis-1')).toBeNull();
    });

    it('should return null for a network without members', () => {
      expect(extractNetworkMemberAddress({ Name: 'kind' }, 'docker-mysql-1')).toBeNull();
    });

    it('should return null when the address is malformed', () => {
      const network = { Containers: { x: { Name: 'node', IPv4Address: 'not-an-ip' } } };
      expect(extractNetworkMemberAddress(network, 'node')).toBeNull();
    });
  });

  describe('extractContainerNetworkAddress', () => {
    const container = {
      Name: '/docker-redis-1',
      NetworkSettings: {
        Networks: {
          docker_default: { IPAddress: '172.20.0.3' },
          kind: { IPAddress: '172.18.0.6' },
        },
      },
    };

    it('should return the address on the requested network', () => {
      expect(extractContainerNetworkAddress(container, 'kind')).toBe('172.18.0.6');
    });

    it('should return null when the container is not on the network', () => {
      expect(extractContainerNetworkAddress(container, 'bridge')).toBeNull();
    });

    it('should return null for an empty address', () => {
      const detached = { NetworkSettings: { Networks: { kind: { IPAddress: '' } } } };
      expect(extractContainerNetworkAddress(detached, 'kind')).toBeNull();
    });

    it('should list attached networks', () => {
      expect(listContainerNetworks(container)).toEqual(['docker_default', 'kind']);
    });
  });

  describe('normalizeAddress', () => {
    it('should reject out-of-range octets', () => {
      expect(isIPv4('172.18.0.256')).toBe(false);
      expect(normalizeAddress('172.18.0.256/16')).toBeNull();
    });

    it('should accept a bare address', () => {
      expect(normalizeAddress('10.0.0.1')).toBe('10.0.0.1');
    });
  });
});
