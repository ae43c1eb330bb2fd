import {
  DocsisOverviewRecord,
  DocsisProvisioningRecord,
  DownstreamChannel,
  DownstreamOfdmChannel,
  LinkStatusRecord,
  SystemInfoRecord,
  UpstreamChannel,
  UpstreamOfdmChannel,
} from '../dto/channel-records.dto';
import {
  formatBool,
  formatDuration,
  formatLinkStatus,
  formatNumber,
  formatOptionalDashString,
  formatOptionalString,
} from './canonical-format';

/**
 * Record Encoders
 *
 * Re-encode typed records into the modem's wire layout using canonical text
 * for every value. Decoding an encoded record gives back the same record.
 */

export type WireRecord = Record<string, string>;

export function encodeSystemInfo(record: SystemInfoRecord): WireRecord {
  return {
    hwVersion: record.hwVersion,
    swVersion: record.swVersion,
    serialNumber: record.serial,
    rfMac: record.rfMac,
    systemUptime: record.systemUptime,
    systemTime: record.systemTime,
  };
}

export function encodeDocsisProvisioning(
  record: DocsisProvisioningRecord,
): WireRecord {
  return {
    hwInit: formatBool(record.hwInit),
    findDownstream: formatBool(record.findDownstream),
    ranging: formatBool(record.ranging),
    dhcp: formatBool(record.dhcp),
    timeOfday: formatBool(record.timeOfDay),
    downloadCfg: formatBool(record.downloadConfig),
    registration: formatBool(record.registration),
    eaeStatus: formatBool(record.eaeStatus),
    bpiStatus: record.bpiStatus,
    networkAccess: formatBool(record.networkAccess),
    trafficStatus: formatBool(record.trafficStatus),
  };
}

export function encodeLinkStatus(record: LinkStatusRecord): WireRecord {
  return {
    LinkStatus: formatLinkStatus(record.status),
    LinkSpeed: formatOptionalDashString(record.speed),
    LinkDuplex: formatOptionalDashString(record.duplex),
  };
}

export function encodeDocsisOverview(record: DocsisOverviewRecord): WireRecord {
  return {
    Configname: record.configName,
    ConfignameDisplay: record.configNameDisplay,
    NetworkAccess: formatBool(record.networkAccess),
    CmIpAddress: formatOptionalString(record.ipAddress),
    CmNetMask: formatOptionalString(record.netmask),
    CmGateway: formatOptionalString(record.gateway),
    CmIpLeaseDuration: formatDuration(record.leaseDurationSeconds),
  };
}

export function encodeDownstreamChannel(channel: DownstreamChannel): WireRecord {
  return {
    portId: formatNumber(channel.portId),
    frequency: formatNumber(channel.frequency),
    modulation: formatNumber(channel.modulation),
    signalStrength: formatNumber(channel.signalStrength),
    snr: formatNumber(channel.snr),
    dsoctets: formatNumber(channel.octets),
    correcteds: formatNumber(channel.corrected),
    uncorrect: formatNumber(channel.uncorrected),
    channelId: formatNumber(channel.channelId),
  };
}

export function encodeDownstreamOfdmChannel(
  channel: DownstreamOfdmChannel,
): WireRecord {
  return {
    receive: formatNumber(channel.receiver),
    ffttype: formatOptionalString(channel.fftType),
    Subcarr0freqFreq: formatNumber(channel.subcarrier0Frequency),
    plclock: formatBool(channel.plcLock),
    ncplock: formatBool(channel.ncpLock),
    mdc1lock: formatBool(channel.mdc1Lock),
    plcpower: formatNumber(channel.plcPower),
    SNR: formatNumber(channel.snr),
    dsoctets: formatNumber(channel.octets),
    correcteds: formatNumber(channel.corrected),
    uncorrect: formatNumber(channel.uncorrected),
  };
}

export function encodeUpstreamChannel(channel: UpstreamChannel): WireRecord {
  return {
    portId: formatNumber(channel.portId),
    frequency: formatNumber(channel.frequency),
    bandwidth: formatNumber(channel.bandwidth),
    modtype: formatOptionalString(channel.modulation),
    scdmaMode: formatOptionalString(channel.docsisMode),
    signalStrength: formatNumber(channel.signalStrength),
    channelId: formatNumber(channel.channelId),
  };
}

export function encodeUpstreamOfdmChannel(
  channel: UpstreamOfdmChannel,
): WireRecord {
  return {
    uschindex: formatNumber(channel.channelId),
    state: formatBool(channel.state),
    frequency: formatNumber(channel.subcarrier0Frequency),
    digAtten: formatNumber(channel.lineDigitalAttenuation),
    digAttenBo: formatNumber(channel.digitalAttenuation),
    channelBw: formatNumber(channel.bandwidth),
    repPower: formatNumber(channel.reportPower),
    repPower1_6: formatNumber(channel.reportPower1_6),
    fftVal: formatOptionalString(channel.fftSize),
  };
}
