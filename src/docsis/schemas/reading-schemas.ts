import { z } from 'zod';
import {
  toBigInteger,
  toBool,
  toDurationSeconds,
  toFloatOrNone,
  toIntOrNone,
  toIpAddress,
  toLinkStatusBool,
  toMacAddress,
  toOptionalDashString,
  toOptionalString,
} from '../normalizers/field-normalizers';
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
import { optionalField, requiredField, requiredText } from './field-schemas';

/**
 * Wire schemas for the Hitron CODA-45 diagnostic pages.
 *
 * Each schema is keyed by the modem's own field names (casing preserved),
 * pairs every field with its normalizer, then renames the result to the
 * typed record. Unknown wire fields are dropped.
 */

const flag = requiredField(toBool, 'a flag');
const channelIndex = requiredField(toIntOrNone, 'an integer');
const optionalInt = optionalField(toIntOrNone);
const optionalFloat = optionalField(toFloatOrNone);
const optionalCounter = optionalField(toBigInteger);
// read as a float, but a fractional value fails the record
const wholeFrequency = optionalFloat.refine(
  (value) => value === null || Number.isInteger(value),
  'is not a whole number',
);
const optionalText = optionalField(toOptionalString);
const ipAddress = optionalField(toIpAddress);

export const systemInfoSchema = z
  .object({
    hwVersion: requiredText,
    swVersion: requiredText,
    serialNumber: requiredText,
    rfMac: requiredField(toMacAddress, 'a MAC address'),
    systemUptime: requiredText,
    systemTime: requiredText,
  })
  .transform(
    (wire): SystemInfoRecord => ({
      hwVersion: wire.hwVersion,
      swVersion: wire.swVersion,
      serial: wire.serialNumber,
      rfMac: wire.rfMac,
      systemUptime: wire.systemUptime,
      systemTime: wire.systemTime,
    }),
  );

export const docsisProvisioningSchema = z
  .object({
    hwInit: flag,
    findDownstream: flag,
    ranging: flag,
    dhcp: flag,
    timeOfday: flag,
    downloadCfg: flag,
    registration: flag,
    eaeStatus: flag,
    bpiStatus: requiredText,
    networkAccess: flag,
    trafficStatus: flag,
  })
  .transform(
    (wire): DocsisProvisioningRecord => ({
      hwInit: wire.hwInit,
      findDownstream: wire.findDownstream,
      ranging: wire.ranging,
      dhcp: wire.dhcp,
      timeOfDay: wire.timeOfday,
      downloadConfig: wire.downloadCfg,
      registration: wire.registration,
      eaeStatus: wire.eaeStatus,
      bpiStatus: wire.bpiStatus,
      networkAccess: wire.networkAccess,
      trafficStatus: wire.trafficStatus,
    }),
  );

export const linkStatusSchema = z
  .object({
    LinkStatus: requiredField(toLinkStatusBool, 'a link status'),
    LinkSpeed: optionalField(toOptionalDashString),
    LinkDuplex: optionalField(toOptionalDashString),
  })
  .transform(
    (wire): LinkStatusRecord => ({
      status: wire.LinkStatus,
      speed: wire.LinkSpeed,
      duplex: wire.LinkDuplex,
    }),
  );

export const docsisOverviewSchema = z
  .object({
    Configname: requiredText,
    ConfignameDisplay: requiredText,
    NetworkAccess: flag,
    CmIpAddress: ipAddress,
    CmNetMask: ipAddress,
    CmGateway: ipAddress,
    CmIpLeaseDuration: requiredField(toDurationSeconds, 'a lease duration'),
  })
  .transform(
    (wire): DocsisOverviewRecord => ({
      configName: wire.Configname,
      configNameDisplay: wire.ConfignameDisplay,
      networkAccess: wire.NetworkAccess,
      ipAddress: wire.CmIpAddress,
      netmask: wire.CmNetMask,
      gateway: wire.CmGateway,
      leaseDurationSeconds: wire.CmIpLeaseDuration,
    }),
  );

export const downstreamChannelSchema = z
  .object({
    portId: channelIndex,
    frequency: optionalInt,
    modulation: optionalInt,
    signalStrength: optionalFloat,
    snr: optionalFloat,
    dsoctets: optionalCounter,
    correcteds: optionalInt,
    uncorrect: optionalInt,
    channelId: optionalInt,
  })
  .transform(
    (wire): DownstreamChannel => ({
      portId: wire.portId,
      frequency: wire.frequency,
      modulation: wire.modulation,
      signalStrength: wire.signalStrength,
      snr: wire.snr,
      octets: wire.dsoctets,
      corrected: wire.correcteds,
      uncorrected: wire.uncorrect,
      channelId: wire.channelId,
    }),
  );

export const downstreamOfdmChannelSchema = z
  .object({
    receive: channelIndex,
    ffttype: optionalText,
    Subcarr0freqFreq: wholeFrequency,
    plclock: flag,
    ncplock: flag,
    mdc1lock: flag,
    plcpower: optionalFloat,
    SNR: optionalFloat,
    dsoctets: optionalCounter,
    correcteds: optionalInt,
    uncorrect: optionalInt,
  })
  .transform(
    (wire): DownstreamOfdmChannel => ({
      receiver: wire.receive,
      fftType: wire.ffttype,
      subcarrier0Frequency: wire.Subcarr0freqFreq,
      plcLock: wire.plclock,
      ncpLock: wire.ncplock,
      mdc1Lock: wire.mdc1lock,
      plcPower: wire.plcpower,
      snr: wire.SNR,
      octets: wire.dsoctets,
      corrected: wire.correcteds,
      uncorrected: wire.uncorrect,
    }),
  );

export const upstreamChannelSchema = z
  .object({
    portId: channelIndex,
    frequency: optionalInt,
    bandwidth: optionalInt,
    modtype: optionalText,
    scdmaMode: optionalText,
    signalStrength: optionalFloat,
    channelId: optionalInt,
  })
  .transform(
    (wire): UpstreamChannel => ({
      portId: wire.portId,
      frequency: wire.frequency,
      bandwidth: wire.bandwidth,
      modulation: wire.modtype,
      docsisMode: wire.scdmaMode,
      signalStrength: wire.signalStrength,
      channelId: wire.channelId,
    }),
  );

export const upstreamOfdmChannelSchema = z
  .object({
    uschindex: channelIndex,
    state: flag,
    frequency: optionalInt,
    digAtten: optionalFloat,
    digAttenBo: optionalFloat,
    channelBw: optionalFloat,
    repPower: optionalFloat,
    repPower1_6: optionalFloat,
    fftVal: optionalText,
  })
  .transform(
    (wire): UpstreamOfdmChannel => ({
      channelId: wire.uschindex,
      state: wire.state,
      subcarrier0Frequency: wire.frequency,
      lineDigitalAttenuation: wire.digAtten,
      digitalAttenuation: wire.digAttenBo,
      bandwidth: wire.channelBw,
      reportPower: wire.repPower,
      reportPower1_6: wire.repPower1_6,
      fftSize: wire.fftVal,
    }),
  );
