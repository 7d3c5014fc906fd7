/**
 * ================================================================================
 * NETWORK SERVICE - Default VPC Placement
 * ================================================================================
 *
 * Services and tasks are placed in the account's default VPC. This service
 * reads the subnets, VPC and security group that placement needs, and the
 * public addresses of task network interfaces.
 */

import {
    EC2Client,
    DescribeSubnetsCommand,
    DescribeVpcsCommand,
    DescribeSecurityGroupsCommand,
    DescribeNetworkInterfacesCommand
} from '@aws-sdk/client-ec2';
import { NetworkInterfaceDetails } from '../types';
import { logger } from '../utils/logger';
import { remoteCall } from '../utils/errors';

export class NetworkService {
    constructor(private readonly ec2: EC2Client) {}

    /**
     * Subnets marked default-for-az, one per availability zone.
     */
    async defaultSubnetIds(): Promise<string[]> {
        return remoteCall('Could not retrieve default subnet IDs', async () => {
            const result = await this.ec2.send(new DescribeSubnetsCommand({
                Filters: [{ Name: 'default-for-az', Values: ['true'] }]
            }));

            const subnetIds = (result.Subnets ?? []).flatMap((subnet) => subnet.SubnetId ? [subnet.SubnetId] : []);
            if (subnetIds.length === 0) {
                throw new Error('No default subnets found; does this region have a default VPC?');
            }

            logger.debug('Default subnets', { subnetIds });
            return subnetIds;
        });
    }

    async defaultVpcId(): Promise<string> {
        return remoteCall('Could not retrieve default VPC ID', async () => {
            const result = await this.ec2.send(new DescribeVpcsCommand({
                Filters: [{ Name: 'isDefault', Values: ['true'] }]
            }));

            const vpcId = result.Vpcs?.[0]?.VpcId;
            if (!vpcId) {
                throw new Error('No default VPC found');
            }
            return vpcId;
        });
    }

    /**
     * The security group named "default" in the default VPC.
     */
    async defaultSecurityGroupId(): Promise<string> {
        const vpcId = await this.defaultVpcId();

        return remoteCall('Could not retrieve default security group', async () => {
            const result = await this.ec2.send(new DescribeSecurityGroupsCommand({
                Filters: [
                    { Name: 'group-name', Values: ['default'] },
                    { Name: 'vpc-id', Values: [vpcId] }
                ]
            }));

            const groupId = result.SecurityGroups?.[0]?.GroupId;
            if (!groupId) {
                throw new Error(`No default security group in ${vpcId}`);
            }
            return groupId;
        });
    }

    async describeNetworkInterfaces(eniIds: string[]): Promise<NetworkInterfaceDetails[]> {
        if (eniIds.length === 0) {
            return [];
        }

        return remoteCall('Could not describe network interfaces', async () => {
            const result = await this.ec2.send(new DescribeNetworkInterfacesCommand({
                NetworkInterfaceIds: eniIds
            }));

            return (result.NetworkInterfaces ?? []).map((eni) => ({
                eniId: eni.NetworkInterfaceId ?? '',
                publicIp: eni.Association?.PublicIp,
                securityGroupIds: (eni.Groups ?? []).flatMap((group) => group.GroupId ? [group.GroupId] : [])
            }));
        });
    }
}
