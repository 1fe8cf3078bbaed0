export interface ApiResponse<T> {
  code: number;
  msg: string;
  data: T | null;
}

export const successResponse = <T>(data: T, msg = "success", code = 200): ApiResponse<T> => ({
  code,
  msg,
  data
});
