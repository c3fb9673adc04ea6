import { COMPUTE_API_BASE_URL, DEFAULT_NETWORK_NAME } from "../../constants/defaults";

export function projectUrl(project: string): string {
  return `${COMPUTE_API_BASE_URL}${project}`;
}

export function machineTypeUrl(project: string, zone: string, machineType: string): string {
  return `${projectUrl(project)}/zones/${zone}/machineTypes/${machineType}`;
}

export function diskTypeUrl(project: string, zone: string, diskType: string): string {
  return `${projectUrl(project)}/zones/${zone}/diskTypes/${diskType}`;
}

export function networkUrl(project: string, network: string = DEFAULT_NETWORK_NAME): string {
  return `${projectUrl(project)}/global/networks/${network}`;
}
