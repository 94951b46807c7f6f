// ConfigModule reads the environment when AppModule is first imported
process.env.NODE_ENV = "test";
process.env.FAUCET_ENABLED = "true";
process.env.ESCROW_VERIFIER = "schnorr";
