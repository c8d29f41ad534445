export type HealthStatus = {
  status: 'ok';
  service: 'dr-agent';
  applications: number;
};

export const getHealthStatus = (applications: number): HealthStatus => ({
  status: 'ok',
  service: 'dr-agent',
  applications,
});
