import type { AppConfig } from "../config";
import { DeliveryService } from "./delivery";
import type { DeviceStore } from "./deviceStore";
import { ImageStore } from "./imageStore";
import { InstallationService } from "./installations";
import type { Notifier } from "./notifier";
import { PushService } from "./push";
import { RenderGate } from "./renderGate";
import type { Clock } from "./renderGate";
import type { Renderer } from "./renderer";
import { AppScheduler } from "./rotation";

export type ServiceConfig = Pick<AppConfig, "dataDir" | "defaultImagePath" | "websocket">;

export interface Services {
  store: DeviceStore;
  notifier: Notifier;
  images: ImageStore;
  renderer: Renderer;
  gate: RenderGate;
  scheduler: AppScheduler;
  delivery: DeliveryService;
  installations: InstallationService;
  push: PushService;
  now: Clock;
}

/** Wires the service graph around the given store, renderer and notifier. */
export function createServices(
  config: ServiceConfig,
  collaborators: { store: DeviceStore; renderer: Renderer; notifier: Notifier; now?: Clock }
): Services {
  const { store, renderer, notifier } = collaborators;
  const now = collaborators.now ?? (() => new Date());

  const images = new ImageStore(config.dataDir, config.defaultImagePath);
  const gate = new RenderGate(store, renderer, images, now);
  const scheduler = new AppScheduler(store, gate, images, now);
  const delivery = new DeliveryService(scheduler, images, config.websocket.pushDwellSecs, now);
  const installations = new InstallationService(store, images, notifier);
  const push = new PushService(store, images, installations, notifier, renderer, now);

  return { store, notifier, images, renderer, gate, scheduler, delivery, installations, push, now };
}
