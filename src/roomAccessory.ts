import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import type { HvacMode, RoomId, RoomState, SubmitResult } from './types.js';
import type { TermowifiPlatform } from './platform.js';
import { MANUFACTURER, MAX_TARGET_TEMP, MIN_TARGET_TEMP, MODEL, TARGET_TEMP_STEP } from './settings.js';

export interface AccessoryInformation {
  manufacturer: string;
  model: string;
  serialNumber: string;
}

export function accessoryInformation(deviceLabel: string, roomId: RoomId): AccessoryInformation {
  return { manufacturer: MANUFACTURER, model: MODEL, serialNumber: `${deviceLabel}_${roomId}` };
}

/** Rooms without a humidity sensor never report it, so the characteristic stays hidden. */
export function hasHumiditySensor(state: RoomState): state is RoomState & { humidity: number } {
  return state.humidity !== undefined;
}

/** One Termowifi room exposed as a HomeKit Thermostat. */
export class RoomAccessory {
  private readonly thermostatService: Service;
  private state: RoomState;
  private humidityBound = false;

  constructor(
    private readonly platform: TermowifiPlatform,
    private readonly accessory: PlatformAccessory,
    state: RoomState,
  ) {
    const { Service, Characteristic } = platform;
    this.state = state;

    const { manufacturer, model, serialNumber } = accessoryInformation(platform.deviceLabel, state.roomId);
    const info = accessory.getService(Service.AccessoryInformation)
      ?? accessory.addService(Service.AccessoryInformation);
    info
      .setCharacteristic(Characteristic.Manufacturer, manufacturer)
      .setCharacteristic(Characteristic.Model, model)
      .setCharacteristic(Characteristic.SerialNumber, serialNumber);

    this.thermostatService = accessory.getService(Service.Thermostat)
      ?? accessory.addService(Service.Thermostat);

    this.thermostatService.setCharacteristic(Characteristic.Name, state.name);

    this.thermostatService.getCharacteristic(Characteristic.CurrentHeatingCoolingState)
      .onGet(() => this.toHeatingCoolingState(this.currentState().hvacMode));

    this.thermostatService.getCharacteristic(Characteristic.TargetHeatingCoolingState)
      .setProps({
        validValues: [
          Characteristic.TargetHeatingCoolingState.OFF,
          Characteristic.TargetHeatingCoolingState.HEAT,
          Characteristic.TargetHeatingCoolingState.COOL,
        ],
      })
      .onGet(() => this.toHeatingCoolingState(this.currentState().hvacMode))
      .onSet((value) => this.setTargetHeatingCoolingState(value));

    this.thermostatService.getCharacteristic(Characteristic.CurrentTemperature)
      .setProps({ minValue: -10, maxValue: 100, minStep: 0.5 })
      .onGet(() => this.currentState().currentTemperature ?? this.currentState().targetTemperature);

    this.thermostatService.getCharacteristic(Characteristic.TargetTemperature)
      .setProps({
        minValue: MIN_TARGET_TEMP,
        maxValue: MAX_TARGET_TEMP,
        minStep: TARGET_TEMP_STEP,
      })
      .onGet(() => this.currentState().targetTemperature)
      .onSet((value) => this.setTargetTemperature(value));

    this.thermostatService.getCharacteristic(Characteristic.TemperatureDisplayUnits)
      .setProps({ validValues: [Characteristic.TemperatureDisplayUnits.CELSIUS] })
      .onGet(() => Characteristic.TemperatureDisplayUnits.CELSIUS);

    // A cached accessory may carry the characteristic from an earlier run.
    if (this.thermostatService.testCharacteristic(Characteristic.CurrentRelativeHumidity)) {
      this.bindHumidity();
    }

    this.thermostatService.addOptionalCharacteristic(Characteristic.StatusFault);
    this.thermostatService.getCharacteristic(Characteristic.StatusFault)
      .onGet(() => this.statusFault(this.state));

    this.updateState(state);
  }

  get displayName(): string {
    return this.accessory.displayName;
  }

  updateState(state: RoomState) {
    const { Characteristic } = this.platform;
    this.state = state;

    const mode = this.toHeatingCoolingState(state.hvacMode);
    this.thermostatService.updateCharacteristic(Characteristic.CurrentHeatingCoolingState, mode);
    this.thermostatService.updateCharacteristic(Characteristic.TargetHeatingCoolingState, mode);
    this.thermostatService.updateCharacteristic(Characteristic.TargetTemperature, state.targetTemperature);
    if (state.currentTemperature !== undefined) {
      this.thermostatService.updateCharacteristic(Characteristic.CurrentTemperature, state.currentTemperature);
    }
    if (hasHumiditySensor(state)) {
      this.bindHumidity();
      this.thermostatService.updateCharacteristic(Characteristic.CurrentRelativeHumidity, state.humidity);
    }
    this.thermostatService.updateCharacteristic(Characteristic.StatusFault, this.statusFault(state));
  }

  private bindHumidity() {
    if (this.humidityBound) return;
    this.humidityBound = true;
    this.thermostatService.getCharacteristic(this.platform.Characteristic.CurrentRelativeHumidity)
      .onGet(() => {
        const { humidity } = this.currentState();
        if (humidity === undefined) {
          throw this.communicationFailure();
        }
        return humidity;
      });
  }

  /** Latest state; an unavailable room answers reads with "No Response". */
  private currentState(): RoomState {
    if (!this.state.available) {
      throw this.communicationFailure();
    }
    return this.state;
  }

  private statusFault(state: RoomState): number {
    const { Characteristic } = this.platform;
    return state.available ? Characteristic.StatusFault.NO_FAULT : Characteristic.StatusFault.GENERAL_FAULT;
  }

  private toHeatingCoolingState(mode: HvacMode): number {
    const { Characteristic } = this.platform;
    switch (mode) {
      case 'heat': return Characteristic.TargetHeatingCoolingState.HEAT;
      case 'cool': return Characteristic.TargetHeatingCoolingState.COOL;
      case 'off': return Characteristic.TargetHeatingCoolingState.OFF;
    }
  }

  private fromHeatingCoolingState(value: number): HvacMode | undefined {
    const { Characteristic } = this.platform;
    switch (value) {
      case Characteristic.TargetHeatingCoolingState.HEAT: return 'heat';
      case Characteristic.TargetHeatingCoolingState.COOL: return 'cool';
      case Characteristic.TargetHeatingCoolingState.OFF: return 'off';
      default: return undefined;
    }
  }

  private setTargetHeatingCoolingState(value: CharacteristicValue) {
    const mode = typeof value === 'number' ? this.fromHeatingCoolingState(value) : undefined;
    if (!mode) {
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
    }
    this.platform.log.info('[%s] Setting mode to %s', this.displayName, mode);
    this.check(this.platform.requireClient().setHvacMode(this.state.roomId, mode));
  }

  private setTargetTemperature(value: CharacteristicValue) {
    if (typeof value !== 'number') {
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
    }
    this.platform.log.info('[%s] Setting target temperature to %s°C', this.displayName, value.toFixed(1));
    this.check(this.platform.requireClient().setTargetTemperature(this.state.roomId, value));
  }

  private check(result: SubmitResult) {
    if (result.accepted) return;
    const { HAPStatus } = this.platform.api.hap;
    if (result.reason === 'out_of_range') {
      throw new this.platform.api.hap.HapStatusError(HAPStatus.INVALID_VALUE_IN_REQUEST);
    }
    if (result.reason === 'queue_full') {
      throw new this.platform.api.hap.HapStatusError(HAPStatus.RESOURCE_BUSY);
    }
    throw this.communicationFailure();
  }

  private communicationFailure() {
    return new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
  }
}
