import 'reflect-metadata';

const INJECTABLE_METADATA_KEY = 'injectable';

export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, true, target);
  };
}

export function isInjectable(target: object): boolean {
  return Reflect.getMetadata(INJECTABLE_METADATA_KEY, target) === true;
}
