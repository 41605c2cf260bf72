export * from './repository.service';
export * from './loader';
export * from './catalog';
export * from './issues';
export * from './card.validator';
export * from './document.schemas';
export * from './lint';
export * from './manifest.service';
export * from './report';
