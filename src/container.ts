import { createContainer, asClass, InjectionMode } from 'awilix';
import { Config } from './configurations';
import { ConsoleLogger } from './logging';
import { SdpLineDecoder } from './decoder';

const container = createContainer({ injectionMode: InjectionMode.PROXY });

container.register({
  config: asClass(Config).singleton(),
  logger: asClass(ConsoleLogger).singleton(),
  lineDecoder: asClass(SdpLineDecoder).singleton(),
});

export { container };
