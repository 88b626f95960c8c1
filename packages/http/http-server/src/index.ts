import 'reflect-metadata';

export { WindApp } from './WindApp';
export { WindConfig, WIND_CONFIG_TOKEN } from './WindConfig';
export { WindServer } from './WindServer';
export { WindFactory } from './WindFactory';
export { WindModule } from './modules/WindModule';
export { RequestHeadParser } from './transport/RequestHeadParser';
export { ClientSocket, SocketConnection } from './transport/SocketConnection';
