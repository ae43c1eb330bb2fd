/**
 * Channel Records
 *
 * Typed form of one element of each diagnostic page. Numeric and text fields
 * the modem may leave blank are `null` when absent; no sentinel text ("-",
 * "N/A", ...) survives decoding.
 *
 * Comments give the wire field name where it differs from the property.
 */

/** /data/getSysInfo.asp */
export interface SystemInfoRecord {
  hwVersion: string;
  swVersion: string;
  /** serialNumber */
  serial: string;
  /** Lower-case, colon separated. */
  rfMac: string;
  systemUptime: string;
  systemTime: string;
}

/** /data/getCMInit.asp */
export interface DocsisProvisioningRecord {
  hwInit: boolean;
  findDownstream: boolean;
  ranging: boolean;
  dhcp: boolean;
  /** timeOfday */
  timeOfDay: boolean;
  /** downloadCfg */
  downloadConfig: boolean;
  registration: boolean;
  eaeStatus: boolean;
  bpiStatus: string;
  networkAccess: boolean;
  trafficStatus: boolean;
}

/** /data/getLinkStatus.asp */
export interface LinkStatusRecord {
  /** LinkStatus, true when "Up" */
  status: boolean;
  /** LinkSpeed */
  speed: string | null;
  /** LinkDuplex */
  duplex: string | null;
}

/** /data/getCmDocsisWan.asp */
export interface DocsisOverviewRecord {
  /** Configname */
  configName: string;
  /** ConfignameDisplay */
  configNameDisplay: string;
  /** NetworkAccess */
  networkAccess: boolean;
  /** CmIpAddress */
  ipAddress: string | null;
  /** CmNetMask */
  netmask: string | null;
  /** CmGateway */
  gateway: string | null;
  /** CmIpLeaseDuration */
  leaseDurationSeconds: number;
}

/** /data/dsinfo.asp - one SC-QAM downstream channel */
export interface DownstreamChannel {
  portId: number;
  /** Hz */
  frequency: number | null;
  modulation: number | null;
  /** dBmV */
  signalStrength: number | null;
  /** dB */
  snr: number | null;
  /** dsoctets */
  octets: bigint | null;
  /** correcteds */
  corrected: number | null;
  /** uncorrect */
  uncorrected: number | null;
  channelId: number | null;
}

/** /data/dsofdminfo.asp - one OFDM downstream receiver */
export interface DownstreamOfdmChannel {
  /** receive */
  receiver: number;
  /** ffttype */
  fftType: string | null;
  /** Subcarr0freqFreq */
  subcarrier0Frequency: number | null;
  /** plclock */
  plcLock: boolean;
  /** ncplock */
  ncpLock: boolean;
  /** mdc1lock */
  mdc1Lock: boolean;
  /** plcpower */
  plcPower: number | null;
  /** SNR */
  snr: number | null;
  /** dsoctets */
  octets: bigint | null;
  /** correcteds */
  corrected: number | null;
  /** uncorrect */
  uncorrected: number | null;
}

/** /data/usinfo.asp - one SC-QAM upstream channel */
export interface UpstreamChannel {
  portId: number;
  frequency: number | null;
  bandwidth: number | null;
  /** modtype */
  modulation: string | null;
  /** scdmaMode */
  docsisMode: string | null;
  signalStrength: number | null;
  channelId: number | null;
}

/** /data/usofdminfo.asp - one OFDMA upstream channel */
export interface UpstreamOfdmChannel {
  /** uschindex */
  channelId: number;
  state: boolean;
  /** frequency */
  subcarrier0Frequency: number | null;
  /** digAtten */
  lineDigitalAttenuation: number | null;
  /** digAttenBo */
  digitalAttenuation: number | null;
  /** channelBw */
  bandwidth: number | null;
  /** repPower */
  reportPower: number | null;
  /** repPower1_6 */
  reportPower1_6: number | null;
  /** fftVal */
  fftSize: string | null;
}
