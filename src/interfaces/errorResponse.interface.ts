export default interface ErrorResponse {
    message: string;
    statusCode: number;
}
