import EventEmitter from 'eventemitter3';
import { Route, RouteFailure, ScanSummary } from '../core/types.js';

export type ScanEvents = {
  scanStarted: (event: { scanId: string; routes: Route[] }) => void;
  routeCompleted: (event: {
    scanId: string;
    route: Route;
    opportunities: number;
    durationMs: number;
  }) => void;
  routeFailed: (event: { scanId: string; failure: RouteFailure }) => void;
  scanCompleted: (summary: ScanSummary) => void;
};

export class ScanEventBus extends EventEmitter<ScanEvents> {}
