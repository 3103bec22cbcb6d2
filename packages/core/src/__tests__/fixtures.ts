/**
 * Shared test fixtures for configuration documents.
 */

export function baseConfigDocument(): Record<string, unknown> {
  return {
    aws: {
      region: 'eu-west-1',
      platform: '64bit Amazon Linux 2023 v4.3.0 running Docker',
      tags: { Project: 'demo' },
    },
    application: {
      name: 'demo',
      environment: 'demo-env',
      description: 'Demo Application',
    },
    instance: {
      type: 't4g.nano',
      elb_type: 'application',
      autoscaling: { min_instances: 1, max_instances: 2 },
      spot_options: { enabled: true },
    },
    iam: {
      service_role_name: 'demo-eb-role',
      service_role_policies: {
        trust_policy: 'eb-trust-policy.json',
        managed_policies: ['arn:aws:iam::aws:policy/service-role/AWSElasticBeanstalkService'],
      },
      instance_profile_name: 'demo-ec2-profile',
      instance_role_name: 'demo-ec2-role',
      instance_role_policies: {
        trust_policy: 'ec2-trust-policy.json',
        managed_policies: ['arn:aws:iam::aws:policy/AWSElasticBeanstalkWebTier'],
      },
    },
    oidc: {
      client_id: 'config-client',
      issuer: 'https://config-issuer.test',
      endpoints: {
        authorization: 'https://config-issuer.test/authorize',
        token: 'https://config-issuer.test/token',
        userinfo: 'https://config-issuer.test/userinfo',
      },
    },
  };
}
