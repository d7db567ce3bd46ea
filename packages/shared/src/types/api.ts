// Field names follow the wire format
export interface WriteResponse {
  objects_written: number;
  time_taken: string;
  errors?: string[];
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  bucket: string;
}
