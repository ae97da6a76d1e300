export type validationErrorType = {
  path: string;
  message: string;
};
