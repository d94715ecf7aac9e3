export { Session, type SessionOptions, type SessionState } from "./session";
export { FetchTransport, type Transport, type HttpResponse, type GetOptions, type PostOptions } from "./transport";
export { paginateTimeline, type TimelineSource, type PaginateOptions } from "./paginate";
